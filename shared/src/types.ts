import { z } from 'zod';

// Language types
export const LanguageSchema = z.enum(['en', 'fr']);
export type Language = z.infer<typeof LanguageSchema>;

export const DEFAULT_LANGUAGE: Language = 'en';

// Turn types - one message of the live conversation, kept only for the browser session
export const TurnRoleSchema = z.enum(['user', 'assistant']);
export type TurnRole = z.infer<typeof TurnRoleSchema>;

export const TurnSchema = z.object({
  role: TurnRoleSchema,
  content: z.string(),
  timestamp: z.string() // ISO timestamp
});

export type Turn = z.infer<typeof TurnSchema>;

// History entries - the persisted, denormalized exchange shown in the sidebar
export const HistoryEntrySchema = z.object({
  timestamp: z.string(),
  prompt: z.string(),
  response: z.string(),
  model: z.string()
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

// Session state machine
// anonymous_guest -> authenticating -> authenticated_member, or anonymous_guest for the whole session
export const AuthStateSchema = z.enum(['anonymous_guest', 'authenticating', 'authenticated_member']);
export type AuthState = z.infer<typeof AuthStateSchema>;

// awaiting_reply blocks a second submit while a request is outstanding
export const ChatPhaseSchema = z.enum(['chatting', 'awaiting_reply']);
export type ChatPhase = z.infer<typeof ChatPhaseSchema>;

// What the UI is allowed to see of a session
export const SessionViewSchema = z.object({
  sessionId: z.string(),
  identifier: z.string(),
  authState: AuthStateSchema,
  guestMode: z.boolean(),
  language: LanguageSchema,
  phase: ChatPhaseSchema,
  turnCount: z.number().int().nonnegative()
});

export type SessionView = z.infer<typeof SessionViewSchema>;

// Result codes returned by the identity layer (never thrown)
export const AuthResultSchema = z.enum(['success', 'invalid_password', 'not_found']);
export type AuthResult = z.infer<typeof AuthResultSchema>;

export const RegisterResultSchema = z.enum(['success', 'already_exists']);
export type RegisterResult = z.infer<typeof RegisterResultSchema>;

// Registration followed by login; store_unavailable when the new member could not be read back
export const SignUpResultSchema = z.enum(['success', 'already_exists', 'store_unavailable']);
export type SignUpResult = z.infer<typeof SignUpResultSchema>;

// Model types
export const ModelInfoSchema = z.object({
  id: z.string(),
  name: z.string()
});

export type ModelInfo = z.infer<typeof ModelInfoSchema>;

export const ConnectionStatusSchema = z.object({
  ok: z.boolean(),
  message: z.string()
});

export type ConnectionStatus = z.infer<typeof ConnectionStatusSchema>;
