import chalk from 'chalk';
import { Command } from 'commander';
import { loadEntityRegistry } from '../core/entities/registry.js';
import { InvalidArgumentError } from '../core/api/errors.js';
import { TOOL_GROUPS, getAllTools, getToolsByEntity, getToolsByGroup } from '../core/registry/index.js';
import type { ToolGroup } from '../core/registry/index.js';
import { localAction } from './api-action.js';

function parseGroup(value: string): ToolGroup {
  const group = TOOL_GROUPS.find((g) => g === value);
  if (!group) throw new InvalidArgumentError(`Unknown tool group '${value}'. Valid groups: ${TOOL_GROUPS.join(', ')}`);
  return group;
}

export function registerToolsCommand(program: Command): void {
  // ── agiloft-mcp tools ─────────────────────────────────────────
  program
    .command('tools')
    .description('List the tools exposed to AI clients')
    .option('--entity <key>', 'Only tools for this entity')
    .option('--group <group>', `Only tools in this group (${TOOL_GROUPS.join(', ')})`)
    .option('--json', 'Output as JSON')
    .action(localAction((opts) => {
      if (opts.entity) loadEntityRegistry().lookup(opts.entity);
      let tools = opts.entity ? getToolsByEntity(opts.entity) : getAllTools();
      if (opts.group) {
        const group = parseGroup(opts.group);
        const inGroup = new Set(getToolsByGroup(group));
        tools = tools.filter((t) => inGroup.has(t));
      }

      if (opts.json) {
        console.log(JSON.stringify(tools.map((t) => ({
          name: t.name,
          group: t.group,
          entity: t.entity,
          readOnly: t.readOnly,
        })), null, 2));
        return;
      }

      console.log(chalk.bold(`Tools (${tools.length}):\n`));
      for (const t of tools) {
        const mode = t.readOnly ? chalk.green('read ') : chalk.yellow('write');
        console.log(`  ${mode}  ${t.name}`);
      }
    }));
}
