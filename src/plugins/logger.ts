import pino from 'pino';
import { config, defaultLogLevel } from '../config/env.js';
import { redactQueryParam } from '../shared/utils.js';

type LoggedRequest = { method?: string; url?: string; host?: string; ip?: string };

const logger = pino({
    level: defaultLogLevel(config),
    serializers: {
        // the upstream key travels in the query string
        req: (req: LoggedRequest) => ({
            method: req.method,
            url: req.url ? redactQueryParam(req.url, 'api_key') : req.url,
            host: req.host,
            remoteAddress: req.ip,
        }),
    },
    transport:
        config.NODE_ENV === 'development'
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined
});

export default logger;
