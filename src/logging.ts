import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
    level?: LevelWithSilent;
    pretty?: boolean;
    name?: string;
}

export const makeLogger = ({ level = 'info', pretty = false, name = 'access-kernel' }: LoggerOptions = {}): Logger =>
    pino({
        name,
        level,
        ...(pretty
            ? {
                transport: {
                    target: 'pino-pretty',
                    options: { colorize: true, translateTime: 'HH:MM:ss.l' },
                },
            }
            : {}),
    });

/** Logger for tests and embedders that do not want output. */
export const silentLogger = (): Logger => makeLogger({ level: 'silent' });
