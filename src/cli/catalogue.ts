import { Command } from 'commander';
import { InvalidArgumentError, NotFoundError } from '../utils/errors.js';
import { isPersonRole } from '../recommendation/recommendation-service.js';
import { addStoreOptions, runWithService, StoreOptions } from './store-options.js';
import {
    formatFilmography,
    formatHealth,
    formatMovieDetails,
    formatMovieList,
    formatNeighbourhood,
    formatStatistics,
    render,
} from './format.js';

interface OutputOptions extends StoreOptions {
    json?: boolean;
}

interface PersonOptions extends OutputOptions {
    role: string;
}

function print(text: string): void {
    process.stdout.write(`${text}\n`);
}

/**
 * Read-only catalogue commands: movies, movie, graph, person, stats, health.
 */
export function registerCatalogueCommands(program: Command): void {
    addStoreOptions(
        program
            .command('movies')
            .description('List every movie in the graph')
            .option('--json', 'Print JSON instead of text', false)
    ).action(async (options: OutputOptions) => {
        await runWithService(options, 'Movies', async service => {
            print(render(await service.listMovies(), options.json, formatMovieList));
        });
    });

    addStoreOptions(
        program
            .command('movie <title>')
            .description('Show a movie with its directors, cast and genres')
            .option('--json', 'Print JSON instead of text', false)
    ).action(async (title: string, options: OutputOptions) => {
        await runWithService(options, 'Movie', async service => {
            const details = await service.getMovieDetails(title);
            if (!details) {
                throw new NotFoundError(`Movie "${title}" not found`);
            }
            print(render(details, options.json, formatMovieDetails));
        });
    });

    addStoreOptions(
        program
            .command('graph <title>')
            .description('Print the neighbourhood of a movie as JSON nodes and edges')
            .option('--text', 'Print one edge per line instead of JSON', false)
    ).action(async (title: string, options: StoreOptions & { text?: boolean }) => {
        await runWithService(options, 'Graph', async service => {
            const neighbourhood = await service.getNeighbourhood(title);
            if (!neighbourhood) {
                throw new NotFoundError(`Movie "${title}" not found`);
            }
            print(render(neighbourhood, !options.text, formatNeighbourhood));
        });
    });

    addStoreOptions(
        program
            .command('person <name>')
            .description('List the movies a person acted in or directed')
            .option('--role <role>', 'actor or director', 'actor')
            .option('--json', 'Print JSON instead of text', false)
    ).action(async (name: string, options: PersonOptions) => {
        await runWithService(options, 'Person', async service => {
            const role = options.role;
            if (!isPersonRole(role)) {
                throw new InvalidArgumentError(`Unknown role "${role}"; expected actor or director`);
            }
            const entries = await service.getFilmography(name, role);
            print(render(entries, options.json, value => formatFilmography(name, role, value)));
        });
    });

    addStoreOptions(
        program
            .command('stats')
            .description('Count movies, people, genres and relationships')
            .option('--json', 'Print JSON instead of text', false)
    ).action(async (options: OutputOptions) => {
        await runWithService(options, 'Stats', async service => {
            print(render(await service.getStatistics(), options.json, formatStatistics));
        });
    });

    addStoreOptions(
        program
            .command('health')
            .description('Check that the graph store answers')
            .option('--json', 'Print JSON instead of text', false)
    ).action(async (options: OutputOptions) => {
        await runWithService(options, 'Health', async service => {
            const health = await service.checkHealth();
            print(render(health, options.json, formatHealth));
            if (health.status === 'unhealthy') {
                process.exitCode = 1;
            }
        });
    });
}
