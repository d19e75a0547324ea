import { z } from "zod";

export const ReferenceInputSchema = z.object({
  uri: z.string().trim().min(1),
  mimeType: z.enum(["application/pdf", "text/plain", "image/png", "image/jpeg"])
});
export type ReferenceInput = z.infer<typeof ReferenceInputSchema>;

export const SyllabusFormSchema = z.object({
  model: z.enum(["flash", "pro"]).default("flash"),
  companyName: z.string().trim().min(1).max(200),
  companyIndustry: z.string().trim().min(1).max(200),
  jobTitle: z.string().trim().min(1).max(200),
  jobLevel: z.string().trim().min(1).max(200),
  classType: z.enum(["upskill", "language"]),
  scopes: z.array(z.string().trim().min(1).max(100)).max(20).default([]),
  classFormat: z.enum(["offline", "online"]),
  learningObjective: z.string().trim().min(1).max(2000),
  references: z.array(ReferenceInputSchema).max(10).default([]),
  stream: z.boolean().default(true)
});
export type SyllabusForm = z.infer<typeof SyllabusFormSchema>;

export type SyllabusResult = {
  syllabus: string;
  prompt: string;
  model: string;
  parameters: { temperature: number; maxOutputTokens?: number };
  references: Array<{ uri: string; url: string }>;
};
