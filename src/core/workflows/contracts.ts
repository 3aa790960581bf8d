/**
 * Contract workflows — multi-step tools built on the dispatcher.
 */
import { z } from 'zod';
import type { AgentContext } from '../../agent/context.js';
import type { ToolDefinition } from '../registry/types.js';
import { sanitizeQueryValue } from '../search/query.js';
import type { FieldMap } from '../api/types.js';
import {
  COMPANY_FIELDS,
  asList,
  asOne,
  errorMessage,
  findCompany,
  parseInput,
  recordView,
  stripEmpty,
  workflowError,
  workflowFailure,
  workflowResponse,
} from './helpers.js';

const DAY_MS = 86_400_000;

export const EXPIRING_SEARCH_LIMIT = 200;

const SUMMARY_FIELDS = [
  'id', 'record_type', 'contract_title1', 'company_name', 'contract_type',
  'contract_amount', 'contract_start_date', 'contract_end_date', 'contract_term_in_months',
  'wfstate', 'internal_contract_owner', 'date_signed', 'confidential',
  'auto_renewal_term_in_months', 'evaluation_frequency', 'contract_description', 'cost_center',
];

const SUMMARY_COMPANY_FIELDS = [
  'id', 'company_name', 'type_of_company', 'status', 'industry', 'main_city', 'country',
  'number_of_active_contracts',
];

const CONTRACT_TYPE_FIELDS = [
  'id', 'contract_type', 'party_type', 'description', 'default_contract_term_in_months',
  'default_autorenewal_term_in_months',
];

export const CONTRACT_ATTACHMENT_FIELD = 'attached_file';

const EXPIRING_FIELDS = [
  'id', 'contract_title1', 'company_name', 'contract_type', 'contract_end_date',
  'contract_amount', 'wfstate', 'auto_renewal_term_in_months', 'internal_contract_owner',
];

// ── Date helpers ─────────────────────────────────────────────────

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Whole days from today (UTC) to a `YYYY-MM-DD…` date, or null when unparseable. */
export function daysUntil(value: unknown, now: Date): number | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(String(value));
  if (!m) return null;
  const end = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  if (Number.isNaN(end)) return null;
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((end - today) / DAY_MS);
}

export type Urgency = 'EXPIRED' | 'URGENT' | 'UPCOMING' | 'PLANNING';

export function urgencyFor(days: number): Urgency {
  if (days < 0) return 'EXPIRED';
  if (days <= 30) return 'URGENT';
  if (days <= 60) return 'UPCOMING';
  return 'PLANNING';
}

/** Plain display value of a linked field (`:Acme` → `Acme`). */
function linkedDisplay(value: unknown): string {
  return typeof value === 'string' ? value.replace(/^:+/, '').trim() : '';
}

// ── preflight_create_contract ────────────────────────────────────

const preflightSchema = z.object({
  contract_type: z.string().trim().default(''),
  company_name: z.string().trim().default(''),
});

async function activeContractTypes(ctx: AgentContext, fields: string[]): Promise<FieldMap[]> {
  const result = await ctx.dispatcher.execute('contract_type', 'search', { query: 'status=Active', fields });
  return asList(result).map(recordView);
}

const preflightCreateContract: ToolDefinition = {
  name: 'agiloft_preflight_create_contract',
  description:
    'Check contract creation prerequisites without creating anything: the contract type is active, ' +
    'the company exists and its type matches the contract type. Call without contract_type to list active types.',
  params: {
    contract_type: { type: 'string', description: 'Contract type name. Omit to list the active contract types.' },
    company_name: { type: 'string', description: 'Company the contract will be linked to' },
  },
  required: [],
  group: 'workflows',
  readOnly: true,
  execute: async (ctx, input) => {
    const operation = 'preflight_create_contract';
    const args = parseInput(preflightSchema, 'agiloft_preflight_create_contract', input);
    const data: Record<string, unknown> = {};
    const warnings: string[] = [];
    const nextSteps: string[] = [];

    try {
      if (!args.contract_type) {
        data.available_contract_types = await activeContractTypes(ctx, CONTRACT_TYPE_FIELDS);
        data.ready_to_create = false;
        nextSteps.push('Pick a contract type from available_contract_types and call this tool again with contract_type.');
        return workflowResponse(operation, data, nextSteps);
      }

      const [type] = asList(
        await ctx.dispatcher.execute('contract_type', 'search', {
          query: `contract_type='${sanitizeQueryValue(args.contract_type)}' AND status=Active`,
          fields: [...CONTRACT_TYPE_FIELDS, 'available_for_record_types'],
          limit: 1,
        }),
      );
      if (!type) {
        warnings.push(`Contract type '${args.contract_type}' not found or not active.`);
        data.ready_to_create = false;
        data.available_contract_types = await activeContractTypes(ctx, ['id', 'contract_type', 'party_type']);
        nextSteps.push('Choose one of the active contract types in available_contract_types.');
        return workflowResponse(operation, data, nextSteps, warnings);
      }
      data.contract_type = recordView(type);

      let ready = true;
      if (args.company_name) {
        const [company] = asList(
          await ctx.dispatcher.execute('company', 'search', {
            query: `company_name~='${sanitizeQueryValue(args.company_name)}'`,
            fields: COMPANY_FIELDS,
            limit: 1,
          }),
        );
        if (!company) {
          ready = false;
          warnings.push(`Company '${args.company_name}' not found. Create it first or check the name.`);
          nextSteps.push('Create the company with agiloft_create_company or agiloft_onboard_company_with_contact first.');
        } else {
          data.company = recordView(company);
          const partyType = type.fields.party_type;
          const companyType = company.fields.type_of_company;
          if (typeof partyType === 'string' && partyType && typeof companyType === 'string' && companyType
            && partyType !== companyType) {
            warnings.push(
              `Type mismatch: contract type expects party_type='${partyType}' but company is ` +
                `type_of_company='${companyType}'.`,
            );
          }
          if (company.fields.status !== 'Active') {
            warnings.push(`Company '${args.company_name}' status is '${String(company.fields.status ?? '')}', not Active.`);
          }
        }
      } else {
        nextSteps.push('Provide company_name to check the company and its type compatibility.');
      }

      data.required_fields = {
        record_type: 'Contract, Child Contract, or Amendment',
        contract_title1: 'string',
        auto_renewal_term_in_months: 'integer',
        confidential: 'string',
        evaluation_frequency: 'integer',
        contract_type: args.contract_type,
        ...(data.company ? { company_name: args.company_name } : {}),
      };
      // linked values take the related record's display value; the wire marker is added on send
      data.linked_fields = [...ctx.dispatcher.registry.lookup('contract').linkedFields];
      data.ready_to_create = ready && warnings.length === 0;

      if (data.ready_to_create) {
        nextSteps.push(
          'All checks passed. Create the contract with agiloft_create_contract or agiloft_create_contract_with_company.',
        );
      }
      return workflowResponse(operation, data, nextSteps, warnings);
    } catch (err) {
      return workflowFailure(operation, err, data);
    }
  },
};

// ── create_contract_with_company ─────────────────────────────────

const createWithCompanySchema = z.object({
  contract_data: z.record(z.unknown()),
  company_name: z.string().trim().min(1, 'company_name is required'),
  create_company_if_missing: z.boolean().default(false),
  company_data: z.record(z.unknown()).default({}),
});

const createContractWithCompany: ToolDefinition = {
  name: 'agiloft_create_contract_with_company',
  description:
    'Create a contract with automatic company resolution. Searches for the company by exact name, ' +
    'optionally creates it if missing, then creates the contract linked to it.',
  params: {
    contract_data: {
      type: 'object',
      description: 'Contract fields to create. company_name is set from the resolved company.',
    },
    company_name: { type: 'string', description: 'Company name to find and link to the contract' },
    create_company_if_missing: {
      type: 'boolean',
      default: false,
      description: "Create the company if it doesn't exist",
    },
    company_data: {
      type: 'object',
      description: 'Company fields used when creating it. Should include type_of_company and status.',
    },
  },
  required: ['contract_data', 'company_name'],
  group: 'workflows',
  readOnly: false,
  execute: async (ctx, input) => {
    const operation = 'create_contract_with_company';
    const args = parseInput(createWithCompanySchema, 'agiloft_create_contract_with_company', input);
    const data: Record<string, unknown> = {};

    try {
      const existing = await findCompany(ctx, args.company_name);
      if (existing) {
        data.company = recordView(existing);
        data.company_action = 'found_existing';
      } else if (args.create_company_if_missing) {
        const created = await ctx.dispatcher.execute('company', 'create', {
          data: stripEmpty({ ...args.company_data, company_name: args.company_name }),
        });
        data.company = recordView(asOne(created));
        data.company_action = 'created_new';
      } else {
        return workflowError(
          operation,
          `Company '${args.company_name}' not found. Set create_company_if_missing=true and provide ` +
            'company_data to create it, or create it separately first.',
        );
      }

      const contract = await ctx.dispatcher.execute('contract', 'create', {
        data: stripEmpty({ ...args.contract_data, company_name: args.company_name }),
      });
      data.contract = recordView(asOne(contract));

      return workflowResponse(operation, data, [
        'Contract created. Review it with agiloft_get_contract_summary or upload files with agiloft_attach_file_to_contract.',
      ]);
    } catch (err) {
      return workflowFailure(operation, err, data);
    }
  },
};

// ── get_contract_summary ─────────────────────────────────────────

const summarySchema = z.object({
  contract_id: z.coerce.number().int().positive(),
});

function healthIssues(contract: FieldMap, daysRemaining: number | null): string[] {
  const issues: string[] = [];
  if (daysRemaining !== null) {
    if (daysRemaining < 0) issues.push(`Contract EXPIRED ${Math.abs(daysRemaining)} days ago`);
    else if (daysRemaining <= 30) issues.push(`Contract expires in ${daysRemaining} days - URGENT`);
    else if (daysRemaining <= 90) issues.push(`Contract expires in ${daysRemaining} days - review soon`);
  }
  if (!contract.contract_amount) issues.push('Missing contract amount');
  if (!contract.internal_contract_owner) issues.push('No contract owner assigned');
  if (!contract.date_signed) issues.push('Contract not yet signed');
  const status = contract.wfstate;
  if (status === 'Draft' || status === 'Cancelled' || status === 'Expired') {
    issues.push(`Contract status is '${status}'`);
  }
  return issues;
}

const getContractSummary: ToolDefinition = {
  name: 'agiloft_get_contract_summary',
  description:
    'Get a contract summary in one call: the contract, its company, days remaining and health issues.',
  params: {
    contract_id: { type: 'integer', minimum: 1, description: 'The ID of the contract to summarize' },
  },
  required: ['contract_id'],
  group: 'workflows',
  readOnly: true,
  execute: async (ctx, input) => {
    const operation = 'get_contract_summary';
    const { contract_id } = parseInput(summarySchema, 'agiloft_get_contract_summary', input);
    const data: Record<string, unknown> = {};
    const warnings: string[] = [];

    try {
      const contract = asOne(await ctx.dispatcher.execute('contract', 'get', { id: contract_id, fields: SUMMARY_FIELDS }));
      data.contract = recordView(contract);

      const companyName = linkedDisplay(contract.fields.company_name);
      if (companyName) {
        try {
          const company = await findCompany(ctx, companyName, SUMMARY_COMPANY_FIELDS);
          if (company) data.company = recordView(company);
          else warnings.push(`Company '${companyName}' not found`);
        } catch (err) {
          warnings.push(`Could not fetch company details: ${errorMessage(err)}`);
        }
      }

      try {
        const info = asOne(
          await ctx.dispatcher.execute('contract', 'getAttachmentInfo', { id: contract_id, field: CONTRACT_ATTACHMENT_FIELD }),
        );
        data.attachments = info.fields;
      } catch (err) {
        data.attachments = { count: 0, note: `No attachments or field not available: ${errorMessage(err)}` };
      }

      const days = daysUntil(contract.fields.contract_end_date, new Date());
      if (days !== null) data.days_remaining = days;
      const issues = healthIssues(contract.fields, days);
      if (issues.length > 0) data.health_issues = issues;

      return workflowResponse(
        operation,
        data,
        [
          'Update fields with agiloft_update_contract, trigger actions with agiloft_action_button_contract, ' +
            'or view the company with agiloft_get_company.',
        ],
        warnings,
      );
    } catch (err) {
      return workflowFailure(operation, err, data);
    }
  },
};

// ── find_expiring_contracts ──────────────────────────────────────

const expiringSchema = z.object({
  days_from_now: z.coerce.number().int().positive().default(90),
  include_expired: z.boolean().default(false),
  status_filter: z.string().trim().optional(),
});

export function expiringQuery(now: Date, daysFromNow: number, includeExpired: boolean, status?: string): string {
  const future = isoDate(new Date(now.getTime() + daysFromNow * DAY_MS));
  let query = includeExpired
    ? `contract_end_date<='${future}'`
    : `contract_end_date>='${isoDate(now)}' AND contract_end_date<='${future}'`;
  if (status) query += ` AND wfstate='${sanitizeQueryValue(status)}'`;
  return query;
}

const findExpiringContracts: ToolDefinition = {
  name: 'agiloft_find_expiring_contracts',
  description:
    'Find contracts expiring within the next N days, bucketed by urgency (URGENT ≤30 days, UPCOMING ≤60, PLANNING).',
  params: {
    days_from_now: { type: 'integer', minimum: 1, default: 90, description: 'Days ahead to look' },
    include_expired: { type: 'boolean', default: false, description: 'Include already-expired contracts' },
    status_filter: { type: 'string', description: "Only contracts in this status (e.g. 'Active')" },
  },
  required: [],
  group: 'workflows',
  readOnly: true,
  execute: async (ctx, input) => {
    const operation = 'find_expiring_contracts';
    const args = parseInput(expiringSchema, 'agiloft_find_expiring_contracts', input);
    const now = new Date();
    const warnings: string[] = [];
    const nextSteps: string[] = [];

    try {
      const records = asList(
        await ctx.dispatcher.execute('contract', 'search', {
          query: expiringQuery(now, args.days_from_now, args.include_expired, args.status_filter),
          fields: EXPIRING_FIELDS,
          limit: EXPIRING_SEARCH_LIMIT,
        }),
      );

      const buckets: Record<Urgency, FieldMap[]> = { EXPIRED: [], URGENT: [], UPCOMING: [], PLANNING: [] };
      for (const record of records) {
        const end = record.fields.contract_end_date;
        if (end === undefined || end === null || end === '') continue;
        const days = daysUntil(end, now);
        if (days === null) {
          warnings.push(`Contract ${record.id ?? '?'}: could not parse end date '${String(end)}'`);
          continue;
        }
        const urgency = urgencyFor(days);
        buckets[urgency].push({ ...recordView(record), days_remaining: days, urgency });
      }

      const data: Record<string, unknown> = {
        summary: {
          total_found: records.length,
          urgent_count: buckets.URGENT.length,
          upcoming_count: buckets.UPCOMING.length,
          planning_count: buckets.PLANNING.length,
          expired_count: buckets.EXPIRED.length,
          search_range_days: args.days_from_now,
        },
        urgent: buckets.URGENT,
        upcoming: buckets.UPCOMING,
        planning: buckets.PLANNING,
      };
      if (args.include_expired) data.expired = buckets.EXPIRED;

      if (buckets.URGENT.length > 0) {
        nextSteps.push(
          `${buckets.URGENT.length} URGENT contract(s) expiring within 30 days - review with agiloft_get_contract_summary.`,
        );
      }
      if (buckets.UPCOMING.length > 0) {
        nextSteps.push(`${buckets.UPCOMING.length} contract(s) expiring in 31-60 days - schedule renewal discussions.`);
      }
      if (records.length === 0) {
        nextSteps.push(`No contracts expiring within ${args.days_from_now} days. Try a larger days_from_now.`);
      }

      return workflowResponse(operation, data, nextSteps, warnings);
    } catch (err) {
      return workflowFailure(operation, err);
    }
  },
};

export const CONTRACT_WORKFLOWS: ToolDefinition[] = [
  preflightCreateContract,
  createContractWithCompany,
  getContractSummary,
  findExpiringContracts,
];
