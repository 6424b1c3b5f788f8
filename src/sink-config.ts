// src/sink-config.ts
// Concrete output destinations, built once per process:
// - colored console at the configured level
// - <LOG_FILE_PATH>/logs/<yyyy-MM-dd>_debug.log, every record
// - <LOG_FILE_PATH>/logs/<yyyy-MM-dd>_error.log, ERROR only

import { closeSync, mkdirSync, openSync } from 'node:fs';
import { join } from 'node:path';
import { format as formatDate } from 'date-fns';
import { getConfig } from './config';
import { SinkConfigError } from './errors';
import { hostLabel, type ColorMode } from './format';
import { ConsoleSink, FileSink } from './sinks';
import { LogLevel, type LogSink, type TraceConfig } from './types';

export const FILE_DATE_FORMAT = 'yyyy-MM-dd';

export interface SinkConfigOptions {
    config?: TraceConfig;
    /** Day used in the file names. Default: now */
    date?: Date;
    color?: ColorMode;
}

/** Create (or truncate) an empty file. */
function touch(path: string): void {
    try {
        closeSync(openSync(path, 'w+'));
    } catch (e) {
        throw new SinkConfigError(`Cannot create log file ${path}`, path, { cause: e });
    }
}

export class SinkConfig {
    readonly logDir: string;
    readonly debugPath: string;
    readonly errorPath: string;
    /** `<arch>[-<ip-suffix>]` */
    readonly label: string;
    readonly consoleLevel: LogLevel;
    readonly sinks: readonly LogSink[];
    private readonly files: FileSink[];

    /**
     * @throws SinkConfigError when the directory or a file cannot be created
     */
    constructor(level: LogLevel, options: SinkConfigOptions = {}) {
        const config = options.config ?? getConfig();
        const day = formatDate(options.date ?? new Date(), FILE_DATE_FORMAT);

        this.logDir = join(config.LOG_FILE_PATH, 'logs');
        try {
            mkdirSync(this.logDir, { recursive: true });
        } catch (e) {
            throw new SinkConfigError(`Cannot create log directory ${this.logDir}`, this.logDir, { cause: e });
        }
        this.debugPath = join(this.logDir, `${day}_debug.log`);
        this.errorPath = join(this.logDir, `${day}_error.log`);
        touch(this.debugPath);
        touch(this.errorPath);

        this.label = hostLabel(config.SYS_ARCH, config.HOST_IP);
        this.consoleLevel = level;
        this.files = [
            new FileSink(this.debugPath, this.label, LogLevel.DEBUG),
            new FileSink(this.errorPath, this.label, LogLevel.ERROR),
        ];
        this.sinks = [...this.files, new ConsoleSink(this.label, level, options.color)];
    }

    /** Flush and close both files. */
    async close(): Promise<void> {
        await Promise.all(this.files.map((f) => f.close()));
    }
}
