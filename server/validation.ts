/**
 * Zod validation schemas for the analysis and review endpoints
 */

import { z } from 'zod';
import { REVIEW_ACTIONS } from './services/reviewWorkflow';

// Strips markup and control characters; collapses all whitespace
const sanitizeText = (text: string): string => {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/[\x00-\x1F\x7F]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
};

// Same, but keeps line breaks for multi-line advice
const sanitizeMultiline = (text: string): string => {
  return text
    .replace(/<[^>]*>/g, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[\x00-\x09\x0B-\x1F\x7F]/g, '')
    .replace(/[ \t]+\n/g, '\n')
    .trim();
};

const sanitizeName = (name: string): string => {
  return name.replace(/[^a-zA-Z0-9\s\-_]/g, '').replace(/\s+/g, ' ').trim();
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// Date-only bounds cover the whole UTC day
const dateBound = (edge: 'start' | 'end') =>
  z.string().trim().optional().transform((value, ctx) => {
    if (!value) return undefined;
    const time = edge === 'start' ? '00:00:00.000' : '23:59:59.999';
    const date = new Date(DATE_ONLY.test(value) ? `${value}T${time}Z` : value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' });
      return z.NEVER;
    }
    return date;
  });

const optionalName = (max: number) =>
  z.string().max(max).optional().transform(val => (val ? sanitizeName(val) || undefined : undefined));

// POST /api/analysis/upload (multipart fields)
export const submitAnalysisSchema = z.object({
  cropType: optionalName(50),
});

// GET /api/analysis/history
export const historyQuerySchema = z.object({
  cropType: optionalName(50),
  search: z.string().max(100).optional().transform(val => (val ? sanitizeText(val) || undefined : undefined)),
  from: dateBound('start'),
  to: dateBound('end'),
  page: z.coerce.number().int().min(1).max(10000).default(1),
}).refine(query => !query.from || !query.to || query.from <= query.to, {
  message: "'from' must not be after 'to'",
  path: ['from'],
});

// POST /api/admin/recommendations/:id/review
export const reviewRecommendationSchema = z.object({
  action: z.enum(REVIEW_ACTIONS),
  feedback: z.string().max(2000).optional().transform(val => (val === undefined ? undefined : sanitizeText(val))),
});

// POST /api/admin/analysis/:id/recommendations
export const adminRecommendationSchema = z.object({
  content: z.string().min(1).max(10000).transform(sanitizeMultiline),
});
