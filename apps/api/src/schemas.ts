import { z } from "zod";

export const extractTextSchema = z.object({
  text: z.string().min(1, "text required"),
  name: z.string().min(1).optional(),
});

export const uploadedFileSchema = z.object({
  name: z.string().min(1),
  mime: z.string().optional(),
  data_base64: z
    .string()
    .min(1, "data_base64 required")
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, "data_base64 must be base64"),
});

export const batchRequestSchema = z.object({
  files: z.array(uploadedFileSchema).min(1, "files[] required"),
  max_pages: z.number().int().positive().optional(),
  split_pages: z.boolean().optional().default(false),
});

export type BatchRequest = z.infer<typeof batchRequestSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}
