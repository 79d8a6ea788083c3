import { Command } from 'commander';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { startServer } from '../api/server.js';
import config from '../config/index.js';
import { addStoreOptions, openService, OpenedService, parsePositiveInt, StoreOptions } from './store-options.js';

const logger = createContextLogger('ServeCmd');

interface ServeOptions extends StoreOptions {
    port?: string;
}

export function registerServeCommand(program: Command): void {
    addStoreOptions(
        program
            .command('serve')
            .description('Start the movie graph API server')
            .option('-p, --port <port>', `Port to run the server on (default: ${config.port})`)
    ).action(async (options: ServeOptions) => {
        let opened: OpenedService | undefined;
        try {
            const port = parsePositiveInt(options.port, '--port') ?? config.port;
            logger.info(`Starting API server on port ${port}...`);

            opened = await openService(options, 'API', createContextLogger('RecommendationService'));
            // The store stays open until the server receives SIGTERM or SIGINT
            await startServer(port, opened.service, opened.close);
        } catch (error: unknown) {
            logger.error(`Failed to start server: ${errorMessage(error)}`);
            process.exitCode = 1;
            if (opened) {
                await opened.close();
            }
        }
    });
}
