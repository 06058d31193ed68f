import { z } from 'zod';

export const CallDescriptorSchema = z.object({
  service: z.string().min(1),
  version: z.string().min(1),
  /** Dot path through the method tree, e.g. `projects.widgets.list`. */
  method: z.string().min(1),
  args: z.record(z.unknown()).default({}),
  auth: z.string().min(1).default('user'),
  iterate: z.boolean().optional(),
  limit: z.number().int().nonnegative().optional(),
  key: z.string().optional(),
  labels: z.string().optional(),
  documentPath: z.string().optional(),
  headers: z.record(z.string()).optional(),
  /** Return only this field of a non-iterated response. */
  resultKey: z.string().optional(),
});

export type CallDescriptor = Readonly<z.infer<typeof CallDescriptorSchema>>;
export type CallDescriptorInput = z.input<typeof CallDescriptorSchema>;

/**
 * Validates and freezes a call descriptor. The descriptor and its top-level
 * argument mapping cannot be changed afterwards.
 */
export function createCallDescriptor(input: CallDescriptorInput): CallDescriptor {
  const parsed = CallDescriptorSchema.parse(input);
  return Object.freeze({
    ...parsed,
    args: Object.freeze(parsed.args),
    headers: parsed.headers ? Object.freeze(parsed.headers) : undefined,
  });
}
