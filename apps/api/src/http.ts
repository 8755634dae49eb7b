// apps/api/src/http.ts
import type { Response } from "express";
import { ZodError, type ZodTypeAny, type output } from "zod";
import { InputInvalidError } from "@avatar-support/core";

export const errMsg = (e: unknown) => (e instanceof Error ? e.message : String(e));

export function parseBody<S extends ZodTypeAny>(schema: S, body: unknown): output<S> {
  const r = schema.safeParse(body ?? {});
  if (!r.success) {
    const detail = r.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    throw new InputInvalidError(detail);
  }
  return r.data;
}

/** 400 si la entrada no vale; 500 para todo lo demás */
export function sendError(res: Response, label: string, e: unknown) {
  if (e instanceof InputInvalidError || e instanceof ZodError) {
    return res.status(400).json({ error: "invalid_input", detail: errMsg(e) });
  }
  console.error(`[${label}] error:`, e);
  return res.status(500).json({ error: "internal_error", detail: errMsg(e) });
}
