// loads .env before the logger reads LOG_LEVEL
import { loadConfig } from './config';
import { startServer } from './api/server';
import { createLogger, setLogLevel } from './utils/logger';
import { errorMessage } from './utils/errors';

const logger = createLogger('main');

// Keep track of recently seen errors to prevent duplicate log floods
const recentErrors = new Set<string>();
const ERROR_CACHE_TIME = 1000; // 1 second

const isDuplicate = (message: string): boolean => {
    if (recentErrors.has(message)) {
        return true;
    }
    recentErrors.add(message);
    setTimeout(() => recentErrors.delete(message), ERROR_CACHE_TIME).unref();
    return false;
};

process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isDuplicate(message)) return;
    logger.error('Unhandled Rejection', { reason });
});

process.on('uncaughtException', (error: Error) => {
    if (isDuplicate(error.message)) return;
    logger.error('Uncaught Exception', { error });
});

function startApplication() {
    try {
        const config = loadConfig();
        setLogLevel(config.logLevel);

        logger.info('Starting market sentiment service...');
        const server = startServer(config);

        const stopApplication = () => {
            logger.info('🛑 Shutting down application...');
            server.close((error) => {
                if (error) {
                    logger.error('Error during shutdown', { error });
                    process.exit(1);
                }
                process.exit(0);
            });
        };

        process.once('SIGINT', stopApplication);
        process.once('SIGTERM', stopApplication);
    } catch (error) {
        logger.error('Failed to start application', { error: errorMessage(error) });
        process.exit(1);
    }
}

startApplication();
