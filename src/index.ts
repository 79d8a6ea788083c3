#!/usr/bin/env node

/**
 * movie-graph CLI entry point.
 *
 * Usage:
 *   movie-graph recommend "Inception" --strategy combined --limit 5
 *   movie-graph movie "Inception" --graph-file ./movies.json
 *   movie-graph serve --port 3001
 *
 * Neo4j connection settings come from NEO4J_* environment variables (or .env)
 * and can be overridden per command with --neo4j-url, --neo4j-user, etc.
 */

import { Command } from 'commander';
import { createContextLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { registerRecommendCommand } from './cli/recommend.js';
import { registerCatalogueCommands } from './cli/catalogue.js';
import { registerServeCommand } from './cli/serve.js';

const logger = createContextLogger('CLI');

const program = new Command();

program
    .name('movie-graph')
    .description('Movie recommendations from a Neo4j knowledge graph of movies, people and genres')
    .version('0.1.0');

registerRecommendCommand(program);
registerCatalogueCommands(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`Command failed: ${errorMessage(error)}`);
    process.exitCode = 1;
});
