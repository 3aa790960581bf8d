import chalk from 'chalk';
import { Command } from 'commander';
import { loadEntityRegistry } from '../core/entities/registry.js';
import { localAction } from './api-action.js';

export function registerEntitiesCommand(program: Command): void {
  // ── agiloft-mcp entities ──────────────────────────────────────
  program
    .command('entities')
    .description('List registered entities and their operations')
    .option('--json', 'Output as JSON')
    .action(localAction((opts) => {
      const entities = loadEntityRegistry().list();

      if (opts.json) {
        console.log(JSON.stringify(entities.map((e) => ({
          key: e.key,
          displayName: e.displayName,
          resourcePath: e.resourcePath,
          searchFields: e.searchFields,
          operations: [...e.operations],
        })), null, 2));
        return;
      }

      console.log(chalk.bold(`Entities (${entities.length}):\n`));
      for (const e of entities) {
        console.log(`  ${chalk.cyan(e.key.padEnd(14))} ${e.displayName}  ${chalk.dim(e.resourcePath)}`);
        console.log(chalk.dim(`    ${[...e.operations].join(', ')}`));
      }
    }));
}
