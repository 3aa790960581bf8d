import chalk from 'chalk';
import { Command } from 'commander';
import { maskConfig } from '../core/config.js';
import { localAction, resolveConfig } from './api-action.js';

export function registerConfigCommand(program: Command): void {
  // ── agiloft-mcp config ────────────────────────────────────────
  program
    .command('config')
    .description('Show the resolved configuration (password masked)')
    .option('--config <file>', 'Config file (default: ./agiloft-mcp.json)')
    .option('--json', 'Output as JSON')
    .action(localAction((opts) => {
      const config = maskConfig(resolveConfig(opts));

      if (opts.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      console.log(chalk.bold('Agiloft'));
      console.log(`  Base URL:   ${config.agiloft.baseUrl}`);
      console.log(`  KB:         ${config.agiloft.kb}`);
      console.log(`  Username:   ${config.agiloft.username}`);
      console.log(`  Password:   ${chalk.dim(config.agiloft.password)}`);
      console.log(`  Language:   ${config.agiloft.language}`);
      console.log(chalk.bold('Server'));
      console.log(`  Log level:  ${config.server.logLevel}`);
      console.log(`  Timeout:    ${config.server.timeout}s`);
      console.log(`  Search concurrency: ${config.server.searchConcurrency}`);
    }));
}
