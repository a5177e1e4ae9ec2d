/**
 * QoL question bank
 * Loaded once from qol-questions.json and validated against the domain list
 */

import { z } from 'zod';
import { QOL_DOMAINS } from '../../../../../shared';
import type { QolDomain } from '../../../../../shared';
import questionData from './qol-questions.json';

export const QolQuestionSchema = z.object({
  id: z.string(),
  domain: z.enum(QOL_DOMAINS),
  order: z.number().int().min(0),
  textKey: z.string(),
  text: z.string(),
});

export type QolQuestion = z.infer<typeof QolQuestionSchema>;

export const QOL_QUESTIONS: readonly QolQuestion[] = z
  .array(QolQuestionSchema)
  .parse(questionData)
  .sort((a, b) => a.order - b.order);

const QUESTIONS_BY_ID = new Map(QOL_QUESTIONS.map((question) => [question.id, question]));

export function getQuestionById(id: string): QolQuestion | undefined {
  return QUESTIONS_BY_ID.get(id);
}

export function getQuestionsByDomain(domain: QolDomain): QolQuestion[] {
  return QOL_QUESTIONS.filter((question) => question.domain === domain);
}
