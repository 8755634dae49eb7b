// packages/knowledge/src/load.ts
import fs from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { createKnowledgeBase } from "./knowledgeBase";
import { KnowledgeConfigError } from "./errors";
import type { KnowledgeBase } from "./types";

const here = dirname(fileURLToPath(import.meta.url));
// .../packages/knowledge/src -> repo root
export const DEFAULT_KNOWLEDGE_FILE = resolve(here, "..", "..", "..", "config", "knowledge.yml");

export function loadKnowledgeBase(file = process.env.KNOWLEDGE_FILE || DEFAULT_KNOWLEDGE_FILE): KnowledgeBase {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf-8");
  } catch (e) {
    throw new KnowledgeConfigError(`no se pudo leer ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new KnowledgeConfigError(`YAML inválido en ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return createKnowledgeBase(doc);
}
