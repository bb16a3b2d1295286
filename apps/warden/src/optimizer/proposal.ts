import { z } from 'zod';
import { ProposalParseError } from '../errors';

/** Settings keys are case-insensitive; every comparison uses the upper-case spelling. */
export function canonicalKey(key: string): string {
  return key.toUpperCase();
}

const impact = z.enum(['low', 'high']).default('low');

const configChangeSchema = z.object({
  kind: z.literal('config'),
  key: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an environment variable name')
    .transform(canonicalKey),
  value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  rationale: z.string().optional(),
  impact,
});

const fileChangeSchema = z
  .object({
    kind: z.literal('file'),
    action: z.enum(['write', 'delete']),
    path: z.string().min(1),
    content: z.string().optional(),
    rationale: z.string().optional(),
    impact,
  })
  .refine((c) => c.action === 'delete' || c.content !== undefined, {
    message: 'a write needs content',
    path: ['content'],
  });

export const proposalSchema = z.object({
  summary: z.string().default(''),
  changes: z.array(z.union([configChangeSchema, fileChangeSchema])).default([]),
});

export type ConfigChange = z.infer<typeof configChangeSchema>;
export type FileChange = z.infer<typeof fileChangeSchema>;
export type ChangeProposal = ConfigChange | FileChange;
export type Proposal = z.infer<typeof proposalSchema>;

const JSON_BLOCK_RE = /```json[^\S\n]*\n([\s\S]*?)```/g;

/** Human-readable handle for a change in logs, reports and refusals. */
export function describeChange(change: ChangeProposal): string {
  return change.kind === 'config' ? `${change.key}=${change.value}` : `${change.action} ${change.path}`;
}

/**
 * Takes the last fenced `json` block of the agent transcript as the proposal.
 * An empty `changes` list is a valid "nothing to change" answer.
 */
export function parseProposal(transcript: string): Proposal {
  const blocks = [...transcript.matchAll(JSON_BLOCK_RE)];
  const last = blocks.at(-1);
  if (!last) {
    throw new ProposalParseError('Agent output contains no ```json proposal block');
  }
  let raw: unknown;
  try {
    raw = JSON.parse(last[1]);
  } catch (err) {
    throw new ProposalParseError(`Proposal block is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = proposalSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ProposalParseError(`Proposal does not match the expected shape: ${issues.join('; ')}`);
  }
  return parsed.data;
}
