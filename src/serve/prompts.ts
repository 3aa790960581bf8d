/**
 * Guided-conversation prompts served over MCP (prompts/list, prompts/get).
 *
 * Each prompt renders one user message that walks the client through a
 * business workflow built from the record and workflow tools.
 */
import { InvalidArgumentError } from '../core/api/errors.js';

export interface PromptArgumentDef {
  name: string;
  description: string;
  required: boolean;
}

export type PromptMessage = {
  role: 'user';
  content: { type: 'text'; text: string };
};

export type RenderedPrompt = {
  description: string;
  messages: PromptMessage[];
};

export interface PromptDefinition {
  name: string;
  description: string;
  arguments: PromptArgumentDef[];
  render(args: Record<string, string>): RenderedPrompt;
}

const LINKED_FIELDS_NOTE =
  'Linked fields (contract_type, company_name, internal_contract_owner) take the display value of the ' +
  'related record, e.g. company_name="Acme Corp". The server adds the link marker itself.';

function userPrompt(description: string, steps: string[]): RenderedPrompt {
  return { description, messages: [{ role: 'user', content: { type: 'text', text: steps.join('\n') } }] };
}

// ── Renderers ────────────────────────────────────────────────────

function renderCreateContract(args: Record<string, string>): RenderedPrompt {
  const steps = ['I want to create a new contract in Agiloft. Guide me through it step by step.'];
  steps.push(
    args.contract_type
      ? `\nUse contract type: ${args.contract_type}`
      : '\nFirst list the active contract types with agiloft_preflight_create_contract (no arguments) and let me choose one.',
  );
  steps.push(
    args.company_name
      ? `\nThe company is: ${args.company_name}. Check that it exists and that its type_of_company matches the contract type's party_type.`
      : '\nOnce I pick a type, ask me for the company name and check it exists and matches the party_type.',
  );
  steps.push(
    '\nThen collect the required fields:\n' +
      '- record_type (Contract, Child Contract, or Amendment)\n' +
      '- contract_title1\n' +
      '- auto_renewal_term_in_months\n' +
      '- confidential\n' +
      '- evaluation_frequency\n' +
      'plus any optional fields I want (dates, amount, owner).',
  );
  steps.push(`\n${LINKED_FIELDS_NOTE}`);
  steps.push(
    '\nRun agiloft_preflight_create_contract with the type and company before creating, then create the ' +
      'contract with agiloft_create_contract or agiloft_create_contract_with_company.',
  );
  steps.push(
    '\nAfterwards, offer to upload attachments with agiloft_attach_file_to_contract ' +
      '(not agiloft_attach_file_contract), passing file_path.',
  );
  return userPrompt('Step-by-step contract creation workflow', steps);
}

function renderContractReview(args: Record<string, string>): RenderedPrompt {
  const steps = ['I want to review a contract in detail.'];
  steps.push(
    args.contract_id
      ? `\nLoad contract ID ${args.contract_id} with agiloft_get_contract_summary.`
      : '\nAsk me for a contract ID or search criteria; search with agiloft_search_contracts and let me pick one.',
  );
  steps.push(
    '\nPresent a summary: title, type, status (wfstate), company, amount, start/end/signed dates, owner, ' +
      'term and auto-renewal.',
  );
  steps.push('\nReport how many files are attached (agiloft_get_attachment_info_contract on attached_file).');
  steps.push(
    '\nFlag issues: end date past or within 30 days, missing amount, dates or owner, status Draft or Cancelled.',
  );
  steps.push(
    '\nOffer actions: update fields with agiloft_update_contract, upload a file with ' +
      'agiloft_attach_file_to_contract, download one with agiloft_retrieve_attachment_attachment, ' +
      'press an action button, or open the company.',
  );
  return userPrompt('Contract review and health check', steps);
}

function renderCompanyOnboarding(args: Record<string, string>): RenderedPrompt {
  const steps = ['I want to onboard a new company in Agiloft.'];
  steps.push(
    args.company_name
      ? `\nFirst check whether "${args.company_name}" already exists with agiloft_search_companies. ` +
          'If it does, show it and ask whether to update it or continue.'
      : '\nAsk me for the company name, then check with agiloft_search_companies whether it exists.',
  );
  steps.push(
    '\nFor a new company collect:\n' +
      '- company_name (required)\n' +
      '- type_of_company (required, e.g. Customer, Vendor, Partner)\n' +
      '- status (required, e.g. Active)\n' +
      '- optional: industry, country, main_city, account_rep',
  );
  steps.push(
    '\nCreate it, with a primary contact if I want one (first_name, last_name, email, title), using ' +
      'agiloft_onboard_company_with_contact.',
  );
  return userPrompt('Company onboarding workflow with optional contact creation', steps);
}

function renderContractSearchReport(args: Record<string, string>): RenderedPrompt {
  const steps = ['I want to search for contracts and get a summary report.'];
  steps.push(
    args.search_criteria
      ? `\nSearch criteria: ${args.search_criteria}\nUse agiloft_search_contracts with a structured query: ` +
          "company_name~='value' for a company, wfstate='value' for a status."
      : '\nAsk me what to look for: company, status (wfstate), contract type, end-date range, amount range, ' +
          'or a combination with AND/OR.',
  );
  steps.push(
    '\nPresent the results as a report: total count; per contract ID, title, company, type, status, amount ' +
      'and end date; totals by amount, status and type.',
  );
  steps.push('\nThen offer to review one contract, refine the search, or list the records for export.');
  return userPrompt('Contract search with summary reporting', steps);
}

function renderContractRenewalCheck(args: Record<string, string>): RenderedPrompt {
  const days = args.days_ahead || '90';
  const steps = [`I want to check for contracts expiring within the next ${days} days.`];
  steps.push(`\nCall agiloft_find_expiring_contracts with days_from_now=${days}.`);
  steps.push(
    '\nGroup the results by urgency: URGENT (within 30 days), UPCOMING (31-60 days), PLANNING (61+ days).',
  );
  steps.push(
    '\nFor each contract show title, company, end date, days remaining, status, auto-renewal term and amount.',
  );
  steps.push(
    '\nSuggest actions: URGENT needs a renewal decision now, UPCOMING needs renewal talks scheduled, ' +
      'PLANNING goes into the renewal pipeline.',
  );
  steps.push('\nOffer to review any contract in full.');
  return userPrompt(`Contract renewal check - next ${days} days`, steps);
}

// ── Registry ─────────────────────────────────────────────────────

export const PROMPTS: PromptDefinition[] = [
  {
    name: 'create-contract',
    description:
      'Guided contract creation: validates the contract type, company compatibility and required fields before creating.',
    arguments: [
      { name: 'contract_type', description: 'Contract type to use; lists the active types when omitted', required: false },
      { name: 'company_name', description: 'Company for the contract; asked for when omitted', required: false },
    ],
    render: renderCreateContract,
  },
  {
    name: 'contract-review',
    description: 'Load a contract, summarize it, check attachments, flag health issues and offer actions.',
    arguments: [{ name: 'contract_id', description: 'Contract ID; asked for or searched when omitted', required: false }],
    render: renderContractReview,
  },
  {
    name: 'company-onboarding',
    description: 'Onboard a company: check it exists, create it, optionally with a primary contact.',
    arguments: [{ name: 'company_name', description: 'Company to onboard; asked for when omitted', required: false }],
    render: renderCompanyOnboarding,
  },
  {
    name: 'contract-search-and-report',
    description: 'Search contracts by any criteria and present the results as a report with statistics.',
    arguments: [{ name: 'search_criteria', description: 'What to search for; asked for when omitted', required: false }],
    render: renderContractSearchReport,
  },
  {
    name: 'contract-renewal-check',
    description: 'Find contracts expiring within N days and suggest actions by urgency.',
    arguments: [{ name: 'days_ahead', description: 'Days ahead to check for expiring contracts', required: true }],
    render: renderContractRenewalCheck,
  },
];

const promptMap = new Map(PROMPTS.map((p) => [p.name, p]));

export function getPrompt(name: string, args: Record<string, string> = {}): RenderedPrompt {
  const prompt = promptMap.get(name);
  if (!prompt) {
    throw new InvalidArgumentError(`Unknown prompt: '${name}'. Valid prompts: ${PROMPTS.map((p) => p.name).join(', ')}`);
  }
  return prompt.render(args);
}
