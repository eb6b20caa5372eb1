import { parseCityEventsQuery } from '../city-events.schemas.js';

describe('parseCityEventsQuery', () => {
  it('accepts the required and optional parameters', () => {
    const res = parseCityEventsQuery({ api_key: 'test-key', city: 'Berlin', postal_code: '10115', search_id: '12' });
    expect(res).toEqual({
      success: true,
      data: { api_key: 'test-key', city: 'Berlin', postal_code: '10115', search_id: 12 },
    });
  });

  it('reports each missing required parameter with its location', () => {
    const res = parseCityEventsQuery({});
    expect(res).toEqual({
      success: false,
      issues: [
        { loc: ['query', 'api_key'], msg: 'Required' },
        { loc: ['query', 'city'], msg: 'Required' },
      ],
    });
  });

  it('rejects an empty city', () => {
    const res = parseCityEventsQuery({ api_key: 'test-key', city: '' });
    expect(res).toEqual({ success: false, issues: [{ loc: ['query', 'city'], msg: 'must not be empty' }] });
  });

  it('rejects a search_id that is not an integer', () => {
    const notNumber = parseCityEventsQuery({ api_key: 'test-key', city: 'Berlin', search_id: 'abc' });
    expect(notNumber).toEqual({
      success: false,
      issues: [{ loc: ['query', 'search_id'], msg: 'must be an integer' }],
    });

    const fraction = parseCityEventsQuery({ api_key: 'test-key', city: 'Berlin', search_id: '1.5' });
    expect(fraction.success).toBe(false);
  });

  it('rejects an empty search_id instead of reading it as 0', () => {
    expect(parseCityEventsQuery({ api_key: 'test-key', city: 'Berlin', search_id: '' })).toEqual({
      success: false,
      issues: [{ loc: ['query', 'search_id'], msg: 'must be an integer' }],
    });
  });

  it('accepts a search_id that was already converted to a number', () => {
    const res = parseCityEventsQuery({ api_key: 'test-key', city: 'Berlin', search_id: -4 });
    expect(res).toEqual({ success: true, data: { api_key: 'test-key', city: 'Berlin', search_id: -4 } });
  });
});
