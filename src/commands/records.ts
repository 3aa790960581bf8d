import chalk from 'chalk';
import { Command } from 'commander';
import type { RecordEnvelope } from '../core/api/types.js';
import type { EntityDescriptor } from '../core/entities/types.js';
import { toToolResult } from '../core/registry/index.js';
import { apiAction } from './api-action.js';
import type { CommandOptions } from './api-action.js';
import { parseFieldList, parsePositiveInt } from './parsers.js';

function label(entity: EntityDescriptor, record: RecordEnvelope): string {
  for (const field of entity.searchFields) {
    const value = record.fields[field];
    if (typeof value === 'string' && value) return value;
  }
  return '';
}

function printFields(record: RecordEnvelope): void {
  for (const [name, value] of Object.entries(record.fields)) {
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    console.log(`  ${chalk.dim(name.padEnd(28))} ${text}`);
  }
}

export function registerRecordCommands(program: Command): void {
  // ── agiloft-mcp search ────────────────────────────────────────
  program
    .command('search <entity> <query...>')
    .description('Search records: free text matches any search field, structured queries pass through')
    .option('--fields <list>', 'Comma-separated fields to return', parseFieldList)
    .option('--limit <n>', 'Max results (default 50)', parsePositiveInt)
    .option('--config <file>', 'Config file (default: ./agiloft-mcp.json)')
    .option('--json', 'Output as JSON')
    .action((entityKey: string, words: string[], opts: CommandOptions) => apiAction(async (app) => {
      const entity = app.registry.lookup(entityKey);
      const result = await app.dispatcher.execute(entity.key, 'search', {
        query: words.join(' '),
        fields: opts.fields,
        limit: opts.limit,
      });
      const records = Array.isArray(result) ? result : [result];

      if (opts.json) {
        console.log(JSON.stringify(toToolResult('search', entity.key, records), null, 2));
        return;
      }
      if (records.length === 0) {
        console.log(chalk.yellow(`No ${entity.displayNamePlural.toLowerCase()} found.`));
        return;
      }
      console.log(chalk.bold(`Found ${records.length} ${entity.displayNamePlural.toLowerCase()}:\n`));
      for (const r of records) {
        console.log(`  ${chalk.cyan(String(r.id ?? '-').padStart(6))}  ${label(entity, r)}`);
      }
    })(opts));

  // ── agiloft-mcp get ───────────────────────────────────────────
  program
    .command('get <entity> <id>')
    .description('Get one record by ID')
    .option('--fields <list>', 'Comma-separated fields to return', parseFieldList)
    .option('--config <file>', 'Config file (default: ./agiloft-mcp.json)')
    .option('--json', 'Output as JSON')
    .action((entityKey: string, id: string, opts: CommandOptions) => apiAction(async (app) => {
      const entity = app.registry.lookup(entityKey);
      const result = await app.dispatcher.execute(entity.key, 'get', {
        id: parsePositiveInt(id),
        fields: opts.fields,
      });
      const record = Array.isArray(result) ? result[0] : result;

      if (opts.json) {
        console.log(JSON.stringify(toToolResult('get', entity.key, result), null, 2));
        return;
      }
      if (!record) return;
      console.log(chalk.bold(`${entity.displayName} #${record.id ?? id}\n`));
      printFields(record);
    })(opts));
}
