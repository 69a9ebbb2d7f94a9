import winston from 'winston';

const colors = {
    cyan: '\u001b[36m',
    end: '\u001b[0m',
};

const timestampFormat = (color = false): winston.Logform.Format => {
    return winston.format(function (info: winston.Logform.TransformableInfo) {
        const timestamp = `[${new Date().toISOString()}]`;
        info.level = color
            ? `${colors.cyan}${timestamp}${colors.end} ${info.level}`
            : `${timestamp} ${info.level}`;
        return info;
    })();
};

const logMsgFormat = (): winston.Logform.Format => {
    return winston.format(function (info: winston.Logform.TransformableInfo) {
        const message = JSON.stringify(info.message);
        if (message.startsWith('"') && message.endsWith('"')) {
            info.message = message.slice(1, -1);
        }
        return info;
    })();
};

// stdout belongs to command output (search results, listings), so every
// level of the console transport goes to stderr.
const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            format: winston.format.combine(
                winston.format.colorize(),
                timestampFormat(true),
                logMsgFormat(),
                winston.format.simple(),
            ),
        }),
    ],
});

const configureLogger = (level: string, filename: string): void => {
    logger.level = level;
    logger.add(
        new winston.transports.File({
            filename,
            format: winston.format.combine(
                timestampFormat(),
                logMsgFormat(),
                winston.format.simple(),
            ),
        }),
    );
};

export default logger;
export { configureLogger };
