// apps/api/src/routes/knowledge.ts
import { Router } from "express";
import { z } from "zod";
import { compose, parseLanguageTag, resolveLanguage } from "@avatar-support/core";
import type { KnowledgeBase } from "@avatar-support/knowledge";
import { parseBody, sendError } from "../http";

const queryBody = z.object({
  query: z.string().trim().min(1).max(2000),
  language: z.string().optional(),
});

const quickFixBody = z.object({
  issue_type: z.string().trim().min(1).max(100),
  language: z.string().optional(),
});

export function knowledgeRouter(deps: { knowledge: KnowledgeBase }) {
  const router = Router();
  const { knowledge } = deps;

  router.post("/api/knowledge/query", (req, res) => {
    try {
      const b = parseBody(queryBody, req.body);
      const language = resolveLanguage(b.language, b.query);
      const c = compose(knowledge, b.query, language);
      return res.json({ answer: c.text, topic: c.topic, matched: c.matched, language_used: language });
    } catch (e) {
      return sendError(res, "/api/knowledge/query", e);
    }
  });

  router.get("/api/knowledge/topics", (req, res) => {
    const language = parseLanguageTag(req.query.language) ?? "en";
    const topics = knowledge.entries.map((e) => ({
      topic: e.topic,
      category: e.category,
      intent: e.intent,
      title: e.title[language],
    }));
    res.json({ topics, count: topics.length, language });
  });

  router.get("/api/knowledge/topics/:topic", (req, res) => {
    const entry = knowledge.get(req.params.topic);
    if (!entry) return res.status(404).json({ error: "not_found", topic: req.params.topic });

    const language = parseLanguageTag(req.query.language) ?? "en";
    return res.json({
      topic: entry.topic,
      category: entry.category,
      intent: entry.intent,
      language,
      title: entry.title[language],
      text: entry.text[language],
      related: knowledge.related(entry.topic).map((r) => ({ topic: r.topic, title: r.title[language] })),
    });
  });

  router.get("/api/knowledge/categories", (_req, res) => {
    const categories = knowledge.categories();
    res.json({ categories, total_categories: categories.length });
  });

  router.get("/api/knowledge/categories/:category", (req, res) => {
    const { category } = req.params;
    const entries = knowledge.byCategory(category);
    if (entries.length === 0) return res.status(404).json({ error: "not_found", category });

    const language = parseLanguageTag(req.query.language) ?? "en";
    const topics = entries.map((e) => ({ topic: e.topic, intent: e.intent, title: e.title[language] }));
    return res.json({ category, language, topics, count: topics.length });
  });

  router.post("/api/knowledge/quick-fix", (req, res) => {
    try {
      const b = parseBody(quickFixBody, req.body);
      const fix = knowledge.quickFix(b.issue_type);
      if (!fix) return res.status(404).json({ error: "not_found", issue_type: b.issue_type });

      const language = parseLanguageTag(b.language) ?? "en";
      return res.json({
        issue_type: fix.key,
        language,
        title: fix.title[language],
        steps: fix.steps[language],
        estimated_time: fix.estimatedTime,
      });
    } catch (e) {
      return sendError(res, "/api/knowledge/quick-fix", e);
    }
  });

  router.get("/api/knowledge/diagnostic-questions/:category", (req, res) => {
    const { category } = req.params;
    const language = parseLanguageTag(req.query.language) ?? "en";
    const questions = knowledge.diagnosticQuestions(category, language);
    if (questions.length === 0) return res.status(404).json({ error: "not_found", category });
    return res.json({ category, language, questions, count: questions.length });
  });

  return router;
}
