import { z } from 'zod';

const TimestampSchema = z.union([z.string(), z.number()]).nullable().optional();

export const FileEntrySchema = z.object({
    name: z.string({ required_error: 'name is required' }).min(1, 'name must not be empty'),
    start: TimestampSchema,
    end: TimestampSchema,
});

// Unknown keys are stripped, so hand-added notes in the document are harmless
export const ConfigDocumentSchema = z.object({
    codec: z.string().min(1).nullable().optional(),
    files: z.record(z.string(), FileEntrySchema),
});

export type FileEntry = z.infer<typeof FileEntrySchema>;
export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
