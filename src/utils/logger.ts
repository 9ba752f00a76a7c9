import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = LEVEL_ORDER[options.level ?? 'info'];
    const write = options.write ?? ((line: string) => console.log(line));

    const emit = (level: Exclude<LogLevel, 'silent'>, line: string) => {
        if (LEVEL_ORDER[level] >= threshold) write(line);
    };

    return {
        debug: message => emit('debug', chalk.gray(message)),
        info: message => emit('info', chalk.white(message)),
        success: message => emit('info', chalk.green(`✔ ${message}`)),
        warn: message => emit('warn', chalk.yellow(`⚠ ${message}`)),
        error: message => emit('error', chalk.red.bold(`✖ ${message}`)),
    };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
