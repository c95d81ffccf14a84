import dotenv from 'dotenv';
import { createBot } from './bot';
import { Logger } from './services/Logger';
import { validateConfig } from './utils/config';

dotenv.config();

const config = validateConfig();
const logger = new Logger(config.logLevel);
const bot = createBot(config, logger);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
        logger.info(`Received ${signal}`);
        bot.shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed:', error);
                process.exit(1);
            });
    });
}

bot.start().catch((error: unknown) => {
    logger.error('Bot could not be started:', error);
    process.exit(1);
});
