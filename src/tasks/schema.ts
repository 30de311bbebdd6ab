import { z } from 'zod';

export const LOWEST_PRIORITY = 4;
export const CLOSED_STATUS = 'closed';

// Tracker-side dependency link; parent-child links describe hierarchy, not ordering
export const DependencyLinkSchema = z.object({
  id: z.string(),
  dependency_type: z.string().optional(),
});

const optionalString = z.string().optional().catch(undefined);
const optionalList = z.array(z.unknown()).optional().catch(undefined);

export const TaskRecordSchema = z.object(
  {
    id: z
      .string({ required_error: 'missing id', invalid_type_error: 'id is not a string' })
      .trim()
      .min(1, 'blank id'),
    title: optionalString,
    description: z.string().nullish().catch(undefined),
    status: optionalString,
    type: optionalString,
    issue_type: optionalString,
    priority: z.number().int().nonnegative().optional().catch(undefined),
    depends_on: optionalList,
    dependsOn: optionalList,
    dependencies: optionalList,
    labels: z.array(z.string()).optional().catch(undefined),
    parent: z.string().nullish().catch(undefined),
  },
  { invalid_type_error: 'record is not an object' }
);

export type ParsedTaskRecord = z.infer<typeof TaskRecordSchema>;

export const TaskFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ tasks: z.array(z.unknown()) }),
  z.object({ issues: z.array(z.unknown()) }),
]);
