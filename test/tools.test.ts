import { describe, it, expect } from 'vitest';
import { createAgentContext } from '../src/agent/context.js';
import { OperationDispatcher } from '../src/core/api/dispatcher.js';
import { SearchEngine } from '../src/core/search/engine.js';
import {
  executeTool,
  getAllTools,
  getReadOnlyTools,
  getToolByName,
  getToolCount,
  getToolsByEntity,
  getToolsByGroup,
  getWriteTools,
  toDispatchArgs,
  useEntityRegistry,
} from '../src/core/registry/index.js';
import { bundledRegistry, transportMock } from './helpers.js';

const registry = bundledRegistry();
useEntityRegistry(registry);

function setup() {
  const transport = transportMock();
  const dispatcher = new OperationDispatcher({ registry, transport, search: new SearchEngine(transport) });
  return { transport, ctx: createAgentContext(dispatcher) };
}

describe('tool registry', () => {
  it('names tools by action and entity, pluralizing search', () => {
    expect(getToolByName('agiloft_search_contracts')).toBeDefined();
    expect(getToolByName('agiloft_get_contract')).toBeDefined();
    expect(getToolByName('agiloft_attach_file_contract')).toBeDefined();
    expect(getToolByName('agiloft_evaluate_format_company')).toBeDefined();
    expect(getToolByName('agiloft_search_contract')).toBeUndefined();
  });

  it('generates tools only for supported operations', () => {
    expect(getToolByName('agiloft_attach_file_employee')).toBeUndefined();
    const names = getToolsByEntity('contract').map((t) => t.name);
    expect(names).toHaveLength(12);
    expect(names[0]).toBe('agiloft_search_contracts');
  });

  it('includes the workflow tools', () => {
    expect(getToolByName('agiloft_find_expiring_contracts')?.group).toBe('workflows');
    const recordTools = registry.list().reduce((n, e) => n + e.operations.size, 0);
    expect(getToolCount()).toBe(recordTools + 6);
    expect(getAllTools()).toHaveLength(getToolCount());
  });

  it('splits read-only and write tools', () => {
    expect(getReadOnlyTools().map((t) => t.name)).toContain('agiloft_get_company');
    expect(getWriteTools().map((t) => t.name)).toContain('agiloft_delete_company');
    expect(getReadOnlyTools().length + getWriteTools().length).toBe(getToolCount());
  });

  it('groups tools by kind', () => {
    expect(getToolsByGroup('workflows').map((t) => t.name)).toEqual([
      'agiloft_preflight_create_contract',
      'agiloft_create_contract_with_company',
      'agiloft_get_contract_summary',
      'agiloft_find_expiring_contracts',
      'agiloft_onboard_company_with_contact',
      'agiloft_attach_file_to_contract',
    ]);
    expect(getToolsByGroup('attachments').map((t) => t.name)).toContain('agiloft_retrieve_attachment_contract');
    expect(getToolsByGroup('actions').every((t) => t.entity !== undefined)).toBe(true);
  });

  it('marks required parameters', () => {
    const upsert = getToolByName('agiloft_upsert_company');
    expect(upsert?.required).toEqual(['query', 'data']);
    expect(upsert?.params.data.description).toContain('- company_name (string, required)');
  });
});

describe('toDispatchArgs', () => {
  it('maps tool arguments onto dispatcher arguments', () => {
    expect(toDispatchArgs({
      record_id: '12',
      delete_rule: 'DELETE_WHERE_POSSIBLE_OTHERWISE_UNLINK',
      file_position: 1,
      button_name: 'Approve',
      fields: 'id, wfstate',
      unrelated: true,
      formula: null,
    })).toEqual({
      id: 12,
      deleteRule: 'DELETE_WHERE_POSSIBLE_OTHERWISE_UNLINK',
      filePosition: 1,
      name: 'Approve',
      fields: ['id', 'wfstate'],
    });
  });
});

describe('executeTool', () => {
  it('returns the search payload with a count', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValue({ success: true, result: [{ id: 1, company_name: 'Acme' }] });

    const output = await executeTool(ctx, 'agiloft_search_companies', { query: 'Acme', fields: ['company_name'] });

    expect(JSON.parse(output)).toEqual({
      success: true,
      operation: 'search',
      entity: 'company',
      count: 1,
      data: [{ company_name: 'Acme' }],
    });
    expect(ctx.toolCalls).toHaveLength(1);
  });

  it('returns the record id for single-record operations', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: 31 });

    const output = await executeTool(ctx, 'agiloft_create_company', { data: { company_name: 'Acme' } });

    expect(JSON.parse(output)).toEqual({
      success: true,
      operation: 'create',
      entity: 'company',
      record_id: 31,
      data: { value: 31 },
    });
    expect(transport.request.mock.calls[0][0].body).toEqual({ company_name: 'Acme' });
  });

  it('returns an error payload instead of throwing', async () => {
    const { ctx } = setup();

    const output = await executeTool(ctx, 'agiloft_get_contract', { record_id: -1 });

    const parsed = JSON.parse(output);
    expect(parsed.success).toBe(false);
    expect(parsed.error).toMatchObject({ kind: 'InvalidArgument', entity: 'contract', operation: 'get' });
    expect(ctx.toolCalls[0].error).toBe(parsed.error.message);
  });

  it('reports unknown tools', async () => {
    const { ctx } = setup();
    const output = await executeTool(ctx, 'agiloft_frobnicate', {});
    expect(JSON.parse(output)).toEqual({
      success: false,
      error: { kind: 'InvalidArgument', message: 'Unknown tool: agiloft_frobnicate' },
    });
  });
});
