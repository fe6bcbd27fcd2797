import { z } from 'zod';
import { LanguageSchema, SessionViewSchema, TurnSchema, HistoryEntrySchema } from './types.js';

// Request bodies

export const CreateSessionRequestSchema = z.object({
  language: LanguageSchema.optional()
});

export type CreateSessionRequest = z.infer<typeof CreateSessionRequestSchema>;

export const RegisterRequestSchema = z.object({
  email: z.string().email(),
  password: z.string().min(8)
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

export const LoginRequestSchema = z.object({
  email: z.string().email(),
  password: z.string()
});

export type LoginRequest = z.infer<typeof LoginRequestSchema>;

export const SendMessageRequestSchema = z.object({
  content: z.string()
});

export type SendMessageRequest = z.infer<typeof SendMessageRequestSchema>;

export const SetLanguageRequestSchema = z.object({
  language: LanguageSchema
});

export type SetLanguageRequest = z.infer<typeof SetLanguageRequestSchema>;

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional()
});

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;

// Responses

export const SessionResponseSchema = z.object({
  token: z.string(),
  session: SessionViewSchema
});

export type SessionResponse = z.infer<typeof SessionResponseSchema>;

export const ExchangeResponseSchema = z.object({
  reply: z.string(),
  turns: z.array(TurnSchema)
});

export type ExchangeResponse = z.infer<typeof ExchangeResponseSchema>;

export const HistoryResponseSchema = z.object({
  entries: z.array(HistoryEntrySchema)
});

export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
