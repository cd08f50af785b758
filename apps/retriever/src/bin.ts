import { main } from './cli';
import logger from './infrastructure/logger';

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        logger.error('Unexpected failure', { error });
        process.exitCode = 1;
    }
);
