import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = [ "error", "warn", "info", "debug" ];

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function createFormat(format: string): winston.Logform.Format {
    if (format === "json") {
        return winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
        );
    }

    return winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ level, message, timestamp, module }) => {
            const scope = typeof module === "string" ? `[${module.toUpperCase()}] ` : "";
            return `${timestamp} [${level.toUpperCase()}] ${scope}${message}`;
        })
    );
}

function createLogger(): winston.Logger {
    const envLevel = process.env.PLAYPEN_LOG_LEVEL;
    const level: LogLevel = process.env.NODE_ENV === "test" ? "error" : isLogLevel(envLevel) ? envLevel : "info";
    const format = createFormat(process.env.PLAYPEN_LOG_FORMAT ?? "simple");

    const transports: winston.transport[] = [
        // Everything goes to stderr so CLI output on stdout stays parseable
        new winston.transports.Console({ stderrLevels: [ ...LOG_LEVELS ] }),
    ];

    const logFile = process.env.PLAYPEN_LOG_FILE;
    if (logFile) {
        transports.push(new winston.transports.File({ filename: logFile }));
    }

    return winston.createLogger({ level,
        format,
        transports });
}

function stringify(msg: unknown): string {
    if (msg instanceof Error) {
        return msg.message;
    }
    return typeof msg === "string" ? msg : String(msg);
}

class Logger {
    private readonly logger = createLogger();

    setLevel(level: LogLevel): void {
        this.logger.level = level;
    }

    debug(module: string, msg: unknown): void {
        this.logger.debug(stringify(msg), { module });
    }

    info(module: string, msg: unknown): void {
        this.logger.info(stringify(msg), { module });
    }

    warn(module: string, msg: unknown): void {
        this.logger.warn(stringify(msg), { module });
    }

    error(module: string, msg: unknown): void {
        this.logger.error(stringify(msg), { module });
    }
}

export const log = new Logger();
