/**
 * Composite workflow tools.
 */
import type { ToolDefinition } from '../registry/types.js';
import { ATTACHMENT_WORKFLOWS } from './attachments.js';
import { COMPANY_WORKFLOWS } from './companies.js';
import { CONTRACT_WORKFLOWS } from './contracts.js';

export const WORKFLOW_TOOLS: ToolDefinition[] = [...CONTRACT_WORKFLOWS, ...COMPANY_WORKFLOWS, ...ATTACHMENT_WORKFLOWS];
