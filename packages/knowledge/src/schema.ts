// packages/knowledge/src/schema.ts
import { z } from "zod";

const localized = z.object({
  en: z.string().trim().min(1),
  es: z.string().trim().min(1),
});

const localizedList = z.object({
  en: z.array(z.string().trim().min(1)).min(1),
  es: z.array(z.string().trim().min(1)).min(1),
});

const key = z.string().regex(/^[a-z0-9_]+$/, "sólo minúsculas, dígitos y _");

export const entrySchema = z.object({
  topic: key,
  category: z.string().min(1).default("general"),
  intent: z.enum(["greeting", "gratitude", "how_to", "problem_solving", "information"]).default("information"),
  title: localized,
  text: localized,
  related: z.array(z.string()).default([]),
});

export const ruleSchema = z.object({
  topic: z.string().min(1),
  keywords: z.array(z.string().trim().min(1)).min(1),
});

export const quickFixSchema = z.object({
  key,
  title: localized,
  steps: localizedList,
  estimated_time: z.string().trim().min(1),
});

export const knowledgeFileSchema = z.object({
  entries: z.array(entrySchema).min(1),
  rules: z.array(ruleSchema).default([]),
  quick_fixes: z.array(quickFixSchema).default([]),
  // categoría -> preguntas para acotar el problema
  diagnostics: z.record(z.string(), localizedList).default({}),
});

export type KnowledgeFile = z.input<typeof knowledgeFileSchema>;
