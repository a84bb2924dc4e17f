import { pino } from 'pino';

function resolveLevel(): string {
    if (process.env.NODE_ENV === 'test') return 'silent';
    if (process.argv.includes('--debug')) return 'debug';
    return process.env.LOG_LEVEL || 'info';
}

export const logger = pino({
    name: 'coverage-agent',
    level: resolveLevel()
});

export function moduleLogger(module: string) {
    return logger.child({ module });
}
