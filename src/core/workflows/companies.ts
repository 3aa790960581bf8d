/**
 * Company onboarding workflow.
 */
import { z } from 'zod';
import type { ToolDefinition } from '../registry/types.js';
import {
  asOne,
  findCompany,
  parseInput,
  recordView,
  stripEmpty,
  workflowError,
  workflowFailure,
  workflowResponse,
} from './helpers.js';

const onboardSchema = z.object({
  company_data: z
    .object({ company_name: z.string().trim().min(1, 'company_data.company_name is required') })
    .passthrough(),
  contact_data: z.record(z.unknown()).optional(),
  skip_if_exists: z.boolean().default(false),
});

const onboardCompanyWithContact: ToolDefinition = {
  name: 'agiloft_onboard_company_with_contact',
  description:
    'Onboard a company with an optional primary contact. Checks whether the company exists, ' +
    'creates it if needed, then creates the contact linked to it.',
  params: {
    company_data: {
      type: 'object',
      description: 'Company fields. Must include company_name; should include type_of_company and status.',
      properties: {
        company_name: { type: 'string', description: 'Company name' },
        type_of_company: { type: 'string', description: 'Type of company (e.g. Customer, Vendor)' },
        status: { type: 'string', description: 'Company status (e.g. Active)' },
      },
      required: ['company_name'],
    },
    contact_data: {
      type: 'object',
      description: 'Primary contact fields; company_name is linked automatically. Omit to create only the company.',
      properties: {
        first_name: { type: 'string' },
        last_name: { type: 'string' },
        email: { type: 'string' },
        title: { type: 'string' },
      },
    },
    skip_if_exists: {
      type: 'boolean',
      default: false,
      description: 'Use the existing company instead of failing when it already exists',
    },
  },
  required: ['company_data'],
  group: 'workflows',
  readOnly: false,
  execute: async (ctx, input) => {
    const operation = 'onboard_company_with_contact';
    const args = parseInput(onboardSchema, 'agiloft_onboard_company_with_contact', input);
    const companyName = args.company_data.company_name;
    const data: Record<string, unknown> = {};
    const warnings: string[] = [];
    const nextSteps: string[] = [];

    try {
      const existing = await findCompany(ctx, companyName);
      if (existing && !args.skip_if_exists) {
        return workflowError(
          operation,
          `Company '${companyName}' already exists (ID: ${existing.id ?? '?'}). Set skip_if_exists=true to use ` +
            'the existing company, or use agiloft_update_company to modify it.',
          { existing_company: recordView(existing) },
        );
      }
      if (existing) {
        data.company = recordView(existing);
        data.company_action = 'already_exists';
        warnings.push(`Company '${companyName}' already exists (ID: ${existing.id ?? '?'}). Skipped creation.`);
      } else {
        const created = await ctx.dispatcher.execute('company', 'create', {
          data: stripEmpty({ ...args.company_data, company_name: companyName }),
        });
        data.company = recordView(asOne(created));
        data.company_action = 'created';
      }

      if (args.contact_data && Object.keys(args.contact_data).length > 0) {
        const contact = await ctx.dispatcher.execute('contact', 'create', {
          data: stripEmpty({ ...args.contact_data, company_name: companyName }),
        });
        data.contact = recordView(asOne(contact));
        data.contact_action = 'created';
      } else {
        nextSteps.push('No contact was created. Use agiloft_create_contact to add one linked to this company.');
      }

      nextSteps.push(
        'Company onboarded. Create a contract with agiloft_create_contract_with_company, or add contacts with agiloft_create_contact.',
      );
      return workflowResponse(operation, data, nextSteps, warnings);
    } catch (err) {
      return workflowFailure(operation, err, data);
    }
  },
};

export const COMPANY_WORKFLOWS: ToolDefinition[] = [onboardCompanyWithContact];
