/**
 * Contract file upload. Contracts carry no file field of their own: the file
 * lives on an Attachment record linked to the contract by its title.
 */
import { readFile } from 'node:fs/promises';
import { basename, isAbsolute } from 'node:path';
import { z } from 'zod';
import type { ToolDefinition } from '../registry/types.js';
import { LINK_MARKER } from '../api/request-builder.js';
import {
  asOne,
  errorMessage,
  parseInput,
  recordView,
  workflowError,
  workflowFailure,
  workflowResponse,
} from './helpers.js';

export const ATTACHMENT_FILE_FIELD = 'attached_file';

/** Attachment records require an expiry; uploads made here never expire. */
const NO_EXPIRY = '2099-12-31';

const attachSchema = z
  .object({
    contract_id: z.coerce.number().int().positive(),
    file_path: z.string().trim().optional(),
    file_content_base64: z.string().optional(),
    file_name: z.string().trim().optional(),
    attachment_title: z.string().trim().optional(),
  })
  .refine((a) => Boolean(a.file_path) || Boolean(a.file_content_base64), {
    message: 'file_path or file_content_base64 is required',
  })
  .refine((a) => Boolean(a.file_path) || Boolean(a.file_name), {
    message: 'file_name is required with file_content_base64',
    path: ['file_name'],
  });

type AttachInput = z.output<typeof attachSchema>;

interface LoadedFile {
  fileName: string;
  content: Uint8Array;
}

async function loadFile(args: AttachInput): Promise<LoadedFile | string> {
  if (args.file_path) {
    if (!isAbsolute(args.file_path)) return `file_path must be absolute, got '${args.file_path}'`;
    let content: Uint8Array;
    try {
      content = await readFile(args.file_path);
    } catch (err) {
      return `Could not read file ${args.file_path}: ${errorMessage(err)}`;
    }
    return { fileName: args.file_name || basename(args.file_path), content };
  }
  return {
    fileName: args.file_name ?? '',
    content: new Uint8Array(Buffer.from(args.file_content_base64 ?? '', 'base64')),
  };
}

const attachFileToContract: ToolDefinition = {
  name: 'agiloft_attach_file_to_contract',
  description:
    'Upload a file to a contract. Creates an Attachment record linked to the contract, uploads the file ' +
    'to it and returns the attachment ID and file info. Use this instead of agiloft_attach_file_contract.',
  params: {
    contract_id: { type: 'integer', minimum: 1, description: 'The ID of the contract to attach the file to' },
    file_path: { type: 'string', description: 'Absolute path of the file on the machine running the server' },
    file_content_base64: {
      type: 'string',
      description: 'File content, base64-encoded. Used when file_path is not given; requires file_name.',
    },
    file_name: { type: 'string', description: 'Name for the uploaded file. Defaults to the name in file_path.' },
    attachment_title: { type: 'string', description: 'Title of the attachment record. Defaults to file_name.' },
  },
  required: ['contract_id'],
  group: 'workflows',
  readOnly: false,
  execute: async (ctx, input) => {
    const operation = 'attach_file_to_contract';
    const args = parseInput(attachSchema, 'agiloft_attach_file_to_contract', input);

    const file = await loadFile(args);
    if (typeof file === 'string') return workflowError(operation, file);
    if (file.content.length === 0) return workflowError(operation, 'File is empty (0 bytes).');

    const data: Record<string, unknown> = {};
    try {
      const contract = asOne(
        await ctx.dispatcher.execute('contract', 'get', { id: args.contract_id, fields: ['id', 'contract_title1'] }),
      );
      data.contract = recordView(contract);
      const title = contract.fields.contract_title1;
      if (typeof title !== 'string' || title.trim() === '') {
        return workflowError(
          operation,
          `Contract ${args.contract_id} has no title (contract_title1). Cannot link attachment.`,
          data,
        );
      }

      const created = asOne(
        await ctx.dispatcher.execute('attachment', 'create', {
          data: {
            title: args.attachment_title || file.fileName,
            status: 'Active',
            expiration_date: NO_EXPIRY,
            contract_title: `${LINK_MARKER}${title.trim()}`,
          },
        }),
      );
      data.attachment_record = created.fields;
      if (created.id === null) {
        return workflowError(operation, 'Created attachment record but could not determine its ID.', data);
      }
      data.attachment_id = created.id;

      const upload = asOne(
        await ctx.dispatcher.execute('attachment', 'attachFile', {
          id: created.id,
          field: ATTACHMENT_FILE_FIELD,
          fileName: file.fileName,
          content: file.content,
        }),
      );
      data.upload_result = upload.fields;

      const info = asOne(
        await ctx.dispatcher.execute('attachment', 'getAttachmentInfo', { id: created.id, field: ATTACHMENT_FILE_FIELD }),
      );
      data.file_info = info.fields;

      return workflowResponse(operation, data, [
        `File '${file.fileName}' attached to contract ${args.contract_id} via attachment record ${created.id}. ` +
          'Download it with agiloft_retrieve_attachment_attachment, inspect it with ' +
          'agiloft_get_attachment_info_attachment, or remove it with agiloft_remove_attachment_attachment.',
      ]);
    } catch (err) {
      return workflowFailure(operation, err, data);
    }
  },
};

export const ATTACHMENT_WORKFLOWS: ToolDefinition[] = [attachFileToContract];
