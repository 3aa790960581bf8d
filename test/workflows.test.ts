import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createAgentContext } from '../src/agent/context.js';
import { OperationDispatcher } from '../src/core/api/dispatcher.js';
import { TransportError } from '../src/core/api/errors.js';
import { SearchEngine } from '../src/core/search/engine.js';
import { executeTool, useEntityRegistry } from '../src/core/registry/index.js';
import { daysUntil, expiringQuery, urgencyFor } from '../src/core/workflows/contracts.js';
import { bundledRegistry, transportMock } from './helpers.js';

const registry = bundledRegistry();
useEntityRegistry(registry);

function setup() {
  const transport = transportMock();
  const dispatcher = new OperationDispatcher({ registry, transport, search: new SearchEngine(transport) });
  return { transport, ctx: createAgentContext(dispatcher) };
}

async function run(ctx: ReturnType<typeof setup>['ctx'], tool: string, input: Record<string, unknown>) {
  return JSON.parse(await executeTool(ctx, tool, input));
}

describe('date helpers', () => {
  const now = new Date('2026-03-01T12:00:00Z');

  it('counts whole days from today', () => {
    expect(daysUntil('2026-03-01', now)).toBe(0);
    expect(daysUntil('2026-03-15T00:00:00', now)).toBe(14);
    expect(daysUntil('2026-02-27', now)).toBe(-2);
    expect(daysUntil('soon', now)).toBeNull();
  });

  it('buckets by urgency', () => {
    expect([-1, 0, 30, 31, 60, 61].map(urgencyFor)).toEqual([
      'EXPIRED', 'URGENT', 'URGENT', 'UPCOMING', 'UPCOMING', 'PLANNING',
    ]);
  });

  it('builds the expiring-contract query', () => {
    expect(expiringQuery(now, 90, false)).toBe(
      "contract_end_date>='2026-03-01' AND contract_end_date<='2026-05-30'",
    );
    expect(expiringQuery(now, 30, true, "O'Neil")).toBe(
      "contract_end_date<='2026-03-31' AND wfstate='O''Neil'",
    );
  });
});

describe('agiloft_create_contract_with_company', () => {
  it('links the contract to an existing company', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [{ id: 4, company_name: 'Acme' }] })
      .mockResolvedValueOnce({ success: true, result: 99 });

    const out = await run(ctx, 'agiloft_create_contract_with_company', {
      contract_data: { contract_title1: 'MSA', contract_description: '' },
      company_name: 'Acme',
    });

    expect(out.success).toBe(true);
    expect(out.data).toEqual({
      company: { id: 4, company_name: 'Acme' },
      company_action: 'found_existing',
      contract: { id: 99, value: 99 },
    });
    const [search, create] = transport.request.mock.calls.map(([req]) => req);
    expect(search.body?.query).toBe("company_name='Acme'");
    expect(create.path).toBe('/contract');
    expect(create.body).toEqual({ contract_title1: 'MSA', company_name: ':Acme' });
  });

  it('fails with guidance when the company is missing', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: [] });

    const out = await run(ctx, 'agiloft_create_contract_with_company', {
      contract_data: { contract_title1: 'MSA' },
      company_name: 'Acme',
    });

    expect(out).toEqual({
      success: false,
      operation: 'create_contract_with_company',
      error:
        "Company 'Acme' not found. Set create_company_if_missing=true and provide company_data to create it, " +
        'or create it separately first.',
    });
    expect(transport.request).toHaveBeenCalledTimes(1);
  });

  it('creates the company first when allowed', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [] })
      .mockResolvedValueOnce({ success: true, result: 5 })
      .mockResolvedValueOnce({ success: true, result: 6 });

    const out = await run(ctx, 'agiloft_create_contract_with_company', {
      contract_data: { contract_title1: 'MSA' },
      company_name: 'Acme',
      create_company_if_missing: true,
      company_data: { type_of_company: 'Vendor', status: 'Active' },
    });

    expect(out.data.company_action).toBe('created_new');
    expect(transport.request.mock.calls[1][0]).toMatchObject({
      path: '/company',
      body: { company_name: 'Acme', type_of_company: 'Vendor', status: 'Active' },
    });
  });

  it('returns partial data when the contract create fails', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [{ id: 4, company_name: 'Acme' }] })
      .mockResolvedValueOnce({ success: false, message: 'Validation failed' });

    const out = await run(ctx, 'agiloft_create_contract_with_company', {
      contract_data: {},
      company_name: 'Acme',
    });

    expect(out.success).toBe(false);
    expect(out.error).toBe('Create failed: Validation failed');
    expect(out.error_details).toEqual({
      kind: 'BackendOperationFailure',
      message: 'Create failed: Validation failed',
      entity: 'contract',
      operation: 'create',
      backendMessage: 'Validation failed',
    });
    expect(out.partial_data.company_action).toBe('found_existing');
  });
});

describe('agiloft_preflight_create_contract', () => {
  it('lists the active contract types when no type is given', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: [{ id: 1, contract_type: 'MSA', party_type: 'Vendor' }] });

    const out = await run(ctx, 'agiloft_preflight_create_contract', {});

    expect(out.data).toEqual({
      available_contract_types: [{ id: 1, contract_type: 'MSA', party_type: 'Vendor' }],
      ready_to_create: false,
    });
    expect(transport.request.mock.calls[0][0]).toMatchObject({ path: '/contract_type/search', body: { query: 'status=Active' } });
  });

  it('warns when the company type does not match the party type', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [{ id: 1, contract_type: 'MSA', party_type: 'Vendor' }] })
      .mockResolvedValueOnce({
        success: true,
        result: [{ id: 4, company_name: 'Acme', type_of_company: 'Customer', status: 'Active' }],
      });

    const out = await run(ctx, 'agiloft_preflight_create_contract', { contract_type: 'MSA', company_name: 'Acme' });

    const [typeSearch, companySearch] = transport.request.mock.calls.map(([req]) => req);
    expect(typeSearch.body?.query).toBe("contract_type='MSA' AND status=Active");
    expect(companySearch.body?.query).toBe("company_name~='Acme'");
    expect(out.warnings).toEqual([
      "Type mismatch: contract type expects party_type='Vendor' but company is type_of_company='Customer'.",
    ]);
    expect(out.data.ready_to_create).toBe(false);
    expect(out.data.linked_fields).toEqual(['company_name', 'internal_contract_owner', 'contract_type']);
  });

  it('is ready when type and company line up', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [{ id: 1, contract_type: 'MSA', party_type: 'Vendor' }] })
      .mockResolvedValueOnce({
        success: true,
        result: [{ id: 4, company_name: 'Acme', type_of_company: 'Vendor', status: 'Active' }],
      });

    const out = await run(ctx, 'agiloft_preflight_create_contract', { contract_type: 'MSA', company_name: 'Acme' });

    expect(out.warnings).toBeUndefined();
    expect(out.data.ready_to_create).toBe(true);
    expect(out.data.required_fields.company_name).toBe('Acme');
  });

  it('falls back to the active types when the type is unknown', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [] })
      .mockResolvedValueOnce({ success: true, result: [{ id: 2, contract_type: 'NDA', party_type: 'Customer' }] });

    const out = await run(ctx, 'agiloft_preflight_create_contract', { contract_type: 'Lease' });

    expect(out.warnings).toEqual(["Contract type 'Lease' not found or not active."]);
    expect(out.data.available_contract_types).toEqual([{ id: 2, contract_type: 'NDA', party_type: 'Customer' }]);
  });
});

describe('agiloft_attach_file_to_contract', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'attach-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function mockUpload(transport: ReturnType<typeof setup>['transport']) {
    transport.request
      .mockResolvedValueOnce({ success: true, result: { id: 7, contract_title1: 'MSA' } })
      .mockResolvedValueOnce({ success: true, result: 31 })
      .mockResolvedValueOnce({ success: true, result: { uploaded: true } })
      .mockResolvedValueOnce({ success: true, result: { count: 1 } });
  }

  it('creates a linked attachment record and uploads the file to it', async () => {
    const { transport, ctx } = setup();
    mockUpload(transport);
    const path = join(dir, 'terms.pdf');
    await writeFile(path, 'hello');

    const out = await run(ctx, 'agiloft_attach_file_to_contract', { contract_id: 7, file_path: path });

    expect(out.success).toBe(true);
    expect(out.data).toMatchObject({ attachment_id: 31, upload_result: { uploaded: true }, file_info: { count: 1 } });
    const [, create, upload, info] = transport.request.mock.calls.map(([req]) => req);
    expect(create).toMatchObject({
      path: '/attachment',
      body: { title: 'terms.pdf', status: 'Active', expiration_date: '2099-12-31', contract_title: ':MSA' },
    });
    expect(upload).toMatchObject({ path: '/attachment/attach/31', query: { field: 'attached_file', fileName: 'terms.pdf' } });
    expect(Buffer.from(upload.file?.content ?? new Uint8Array()).toString()).toBe('hello');
    expect(info.path).toBe('/attachment/attachInfo/31');
  });

  it('accepts base64 content with a file name', async () => {
    const { transport, ctx } = setup();
    mockUpload(transport);

    const out = await run(ctx, 'agiloft_attach_file_to_contract', {
      contract_id: 7,
      file_content_base64: 'aGk=',
      file_name: 'a.txt',
      attachment_title: 'Signed copy',
    });

    expect(out.success).toBe(true);
    const [, create, upload] = transport.request.mock.calls.map(([req]) => req);
    expect(create.body?.title).toBe('Signed copy');
    expect(Buffer.from(upload.file?.content ?? new Uint8Array()).toString()).toBe('hi');
  });

  it('rejects relative, missing and empty files before any request', async () => {
    const { transport, ctx } = setup();
    const empty = join(dir, 'empty.txt');
    await writeFile(empty, '');

    const relative = await run(ctx, 'agiloft_attach_file_to_contract', { contract_id: 7, file_path: 'terms.pdf' });
    const missing = await run(ctx, 'agiloft_attach_file_to_contract', { contract_id: 7, file_path: join(dir, 'nope.pdf') });
    const blank = await run(ctx, 'agiloft_attach_file_to_contract', { contract_id: 7, file_path: empty });

    expect(relative.error).toBe("file_path must be absolute, got 'terms.pdf'");
    expect(missing.error).toMatch(/^Could not read file .*nope\.pdf: /);
    expect(blank.error).toBe('File is empty (0 bytes).');
    expect(transport.request).not.toHaveBeenCalled();
  });

  it('stops when the contract has no title', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: { id: 7 } });

    const out = await run(ctx, 'agiloft_attach_file_to_contract', {
      contract_id: 7,
      file_content_base64: 'aGk=',
      file_name: 'a.txt',
    });

    expect(out).toEqual({
      success: false,
      operation: 'attach_file_to_contract',
      error: 'Contract 7 has no title (contract_title1). Cannot link attachment.',
      partial_data: { contract: { id: 7 } },
    });
  });
});

describe('agiloft_onboard_company_with_contact', () => {
  it('creates the company and a linked contact', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: [] })
      .mockResolvedValueOnce({ success: true, result: 8 })
      .mockResolvedValueOnce({ success: true, result: 11 });

    const out = await run(ctx, 'agiloft_onboard_company_with_contact', {
      company_data: { company_name: 'Acme', type_of_company: 'Customer', status: 'Active' },
      contact_data: { first_name: 'Ada', email: '' },
    });

    expect(out.data).toMatchObject({ company_action: 'created', contact_action: 'created', contact: { id: 11 } });
    expect(transport.request.mock.calls[2][0]).toMatchObject({
      path: '/contacts',
      body: { first_name: 'Ada', company_name: ':Acme' },
    });
  });

  it('refuses an existing company unless told to skip', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: [{ id: 3, company_name: 'Acme' }] });

    const out = await run(ctx, 'agiloft_onboard_company_with_contact', { company_data: { company_name: 'Acme' } });

    expect(out.success).toBe(false);
    expect(out.partial_data).toEqual({ existing_company: { id: 3, company_name: 'Acme' } });
  });

  it('reuses an existing company with skip_if_exists', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({ success: true, result: [{ id: 3, company_name: 'Acme' }] });

    const out = await run(ctx, 'agiloft_onboard_company_with_contact', {
      company_data: { company_name: 'Acme' },
      skip_if_exists: true,
    });

    expect(out.data.company_action).toBe('already_exists');
    expect(out.warnings).toEqual(["Company 'Acme' already exists (ID: 3). Skipped creation."]);
    expect(transport.request).toHaveBeenCalledTimes(1);
  });

  it('requires a company name', async () => {
    const { ctx } = setup();
    const out = await run(ctx, 'agiloft_onboard_company_with_contact', { company_data: {} });
    expect(out.error.kind).toBe('InvalidArgument');
  });
});

describe('clock-dependent workflows', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('buckets expiring contracts', async () => {
    const { transport, ctx } = setup();
    transport.request.mockResolvedValueOnce({
      success: true,
      result: [
        { id: 1, contract_title1: 'A', contract_end_date: '2026-03-15' },
        { id: 2, contract_title1: 'B', contract_end_date: '2026-04-20' },
        { id: 3, contract_title1: 'C', contract_end_date: '2026-05-20' },
        { id: 4, contract_title1: 'D', contract_end_date: 'soon' },
        { id: 5, contract_title1: 'E' },
      ],
    });

    const out = await run(ctx, 'agiloft_find_expiring_contracts', { status_filter: 'Active' });

    expect(transport.request.mock.calls[0][0].body?.query).toBe(
      "contract_end_date>='2026-03-01' AND contract_end_date<='2026-05-30' AND wfstate='Active'",
    );
    expect(out.data.summary).toEqual({
      total_found: 5,
      urgent_count: 1,
      upcoming_count: 1,
      planning_count: 1,
      expired_count: 0,
      search_range_days: 90,
    });
    expect(out.data.urgent).toEqual([
      { id: 1, contract_title1: 'A', contract_end_date: '2026-03-15', days_remaining: 14, urgency: 'URGENT' },
    ]);
    expect(out.data.upcoming[0].days_remaining).toBe(50);
    expect(out.data.planning[0].days_remaining).toBe(80);
    expect(out.data.expired).toBeUndefined();
    expect(out.warnings).toEqual(["Contract 4: could not parse end date 'soon'"]);
    expect(out.next_steps).toHaveLength(2);
  });

  it('summarizes a contract and downgrades a failed company lookup to a warning', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({
        success: true,
        result: { id: 7, contract_title1: 'MSA', company_name: ':Acme', contract_end_date: '2026-03-21', wfstate: 'Draft' },
      })
      .mockRejectedValueOnce(new TransportError('boom'))
      .mockResolvedValueOnce({ success: true, result: { count: 2 } });

    const out = await run(ctx, 'agiloft_get_contract_summary', { contract_id: 7 });

    expect(out.success).toBe(true);
    expect(out.data.days_remaining).toBe(20);
    expect(out.data.health_issues).toEqual([
      'Contract expires in 20 days - URGENT',
      'Missing contract amount',
      'No contract owner assigned',
      'Contract not yet signed',
      "Contract status is 'Draft'",
    ]);
    expect(out.warnings).toEqual(['Could not fetch company details: boom']);
    expect(out.data.attachments).toEqual({ count: 2 });
    expect(transport.request.mock.calls[1][0].body?.query).toBe("company_name='Acme'");
    expect(transport.request.mock.calls[2][0]).toMatchObject({
      path: '/contract/attachInfo/7',
      query: { field: 'attached_file' },
    });
  });

  it('notes a failed attachment lookup without failing the summary', async () => {
    const { transport, ctx } = setup();
    transport.request
      .mockResolvedValueOnce({ success: true, result: { id: 8, contract_title1: 'NDA', contract_amount: 10 } })
      .mockRejectedValueOnce(new TransportError('API request failed: 404 - no field'));

    const out = await run(ctx, 'agiloft_get_contract_summary', { contract_id: 8 });

    expect(out.success).toBe(true);
    expect(out.data.attachments).toEqual({
      count: 0,
      note: 'No attachments or field not available: API request failed: 404 - no field',
    });
  });
});
