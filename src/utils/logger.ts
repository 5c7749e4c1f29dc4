import pino from 'pino'

import { defaultConfig, determineRuntimeEnv } from '../config/config'
import { LogLevel } from '../types'

/**
 * Thin wrapper over pino. Positional args are joined into `msg` behind a `[NAME]` prefix and a
 * trailing plain object is merged into the line, so call sites read
 * `logger.error('🔁', 'consumer_poll_drive_error', { error })`.
 */
export class Logger {
    private pino: ReturnType<typeof pino>
    private prefix: string
    private transport?: ReturnType<typeof pino.transport>
    private isShutdown = false

    constructor(name: string, level: LogLevel = defaultConfig.LOG_LEVEL) {
        this.prefix = `[${name.toUpperCase()}]`
        const runtimeEnv = determineRuntimeEnv()
        if (runtimeEnv === 'prod') {
            this.pino = pino({
                formatters: { level: (label) => ({ level: label }) },
                level,
            })
        } else if (runtimeEnv === 'test') {
            // No worker thread under Jest, it would outlive the test run
            this.pino = pino({ level })
        } else {
            this.transport = pino.transport({ target: 'pino-pretty', options: { sync: true } })
            this.pino = pino({ level }, this.transport)
        }
    }

    /** Lets hot paths skip building a log line nobody will see. */
    isLevelEnabled(level: LogLevel): boolean {
        return this.pino.isLevelEnabled(level)
    }

    private _log(level: LogLevel, ...args: unknown[]): void {
        if (this.isShutdown) {
            return
        }

        const lastArg = args[args.length - 1]
        const extra = typeof lastArg === 'object' && lastArg !== null && !(lastArg instanceof Error) ? lastArg : undefined
        if (extra) {
            args.pop()
        }

        this.pino[level]({ ...extra, msg: `${this.prefix} ${args.join(' ')}` })
    }

    debug(...args: unknown[]): void {
        this._log('debug', ...args)
    }

    info(...args: unknown[]): void {
        this._log('info', ...args)
    }

    warn(...args: unknown[]): void {
        this._log('warn', ...args)
    }

    error(...args: unknown[]): void {
        this._log('error', ...args)
    }

    async shutdown(): Promise<void> {
        this.isShutdown = true
        await this.transport?.end()
    }
}

export const logger = new Logger('consumer')

export async function shutdownLogger(): Promise<void> {
    await logger.shutdown()
}
