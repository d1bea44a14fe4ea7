import { Router } from "express";
import { z } from "zod";
import { validateBody } from "../middleware/validate";
import { findSimilarQuestion } from "../rag/matcher";
import { retrieveKnowledge } from "../rag/retriever";

const questionSchema = z.object({
  question: z.string().trim().min(1, "question must not be empty"),
});

const knowledgeSchema = questionSchema.extend({
  limit: z.number().int().min(1).max(20).default(5),
});

const router = Router();

router.post("/find-similar-question", validateBody(questionSchema), async (req, res, next) => {
  try {
    const { question }: z.infer<typeof questionSchema> = req.body;
    res.json(await findSimilarQuestion(question));
  } catch (err) {
    next(err);
  }
});

router.post("/search-knowledge", validateBody(knowledgeSchema), async (req, res, next) => {
  try {
    const { question, limit }: z.infer<typeof knowledgeSchema> = req.body;
    const chunks = await retrieveKnowledge(question, limit);
    res.json({ chunks });
  } catch (err) {
    next(err);
  }
});

router.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

export default router;
