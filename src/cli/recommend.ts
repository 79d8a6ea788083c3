import { Command } from 'commander';
import { createContextLogger } from '../utils/logger.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { isStrategy, STRATEGIES, toRecommendationView } from '../recommendation/types.js';
import { addStoreOptions, parsePositiveInt, runWithService, StoreOptions } from './store-options.js';
import { formatRecommendations, render } from './format.js';

const logger = createContextLogger('RecommendCmd');

interface RecommendOptions extends StoreOptions {
    strategy: string;
    limit?: string;
    json?: boolean;
}

export function registerRecommendCommand(program: Command): void {
    const command = program
        .command('recommend <title>')
        .description('Recommend movies similar to <title> by shared genres and cast')
        .option('-s, --strategy <strategy>', `Ranking strategy (${STRATEGIES.join(', ')})`, 'combined')
        .option('-n, --limit <n>', 'Maximum number of recommendations (default from RECOMMEND_DEFAULT_LIMIT)')
        .option('--json', 'Print JSON instead of text', false);

    addStoreOptions(command).action(async (title: string, options: RecommendOptions) => {
        logger.info(`Received recommend command for "${title}" (${options.strategy})`);

        await runWithService(options, 'Recommend', async service => {
            const strategy = options.strategy;
            if (!isStrategy(strategy)) {
                throw new InvalidArgumentError(`Unknown strategy "${strategy}"; expected one of ${STRATEGIES.join(', ')}`);
            }
            const limit = parsePositiveInt(options.limit, '--limit') ?? service.defaultLimit;

            const recommendations = await service.recommend(title, strategy, limit);
            const views = recommendations.map(toRecommendationView);
            process.stdout.write(`${render(views, options.json, value => formatRecommendations(title, strategy, value))}\n`);
        });
    });
}
