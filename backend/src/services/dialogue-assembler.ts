import type { Turn } from '@martin-chat/shared';
import type { ChatMessage, InferenceClient } from './inference.js';
import type { ConversationLog } from './conversation-log.js';
import type { SessionContext } from './session-context.js';
import { getPromptTemplates, WRAP_UP_LABEL } from './prompt-templates.js';
import { scanReasoning } from '../utils/thinking-parser.js';
import { Logger } from '../utils/logger.js';
import { USER_FACING_ERRORS } from '../utils/error-messages.js';

export class DialogueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DialogueError';
  }
}

export class EmptyMessageError extends DialogueError {
  constructor() {
    super(USER_FACING_ERRORS.EMPTY_MESSAGE);
    this.name = 'EmptyMessageError';
  }
}

export class EmptyTranscriptError extends DialogueError {
  constructor() {
    super(USER_FACING_ERRORS.EMPTY_TRANSCRIPT);
    this.name = 'EmptyTranscriptError';
  }
}

export class ReplyPendingError extends DialogueError {
  constructor() {
    super(USER_FACING_ERRORS.REPLY_PENDING);
    this.name = 'ReplyPendingError';
  }
}

export interface DialogueSettings {
  model: string;
  temperature: number;
}

// '' when the session has no bound identity
interface ExchangeOwner {
  identifier: string;
  turns: Turn[];
}

export interface Exchange {
  reply: string;
  /** Copy of the session transcript after the exchange */
  turns: Turn[];
}

/**
 * Turns user input into inference requests and folds the replies back into the
 * session transcript and, for sessions with a bound identity, the
 * conversation log.
 */
export class DialogueAssembler {
  private inference: InferenceClient;
  private log: ConversationLog;
  private settings: DialogueSettings;
  private now: () => Date;

  constructor(inference: InferenceClient, log: ConversationLog, settings: DialogueSettings, now: () => Date = () => new Date()) {
    this.inference = inference;
    this.log = log;
    this.settings = settings;
    this.now = now;
  }

  /**
   * One chat exchange. On inference failure the user turn stays in the
   * transcript and the error propagates unchanged.
   */
  async send(session: SessionContext, message: string): Promise<Exchange> {
    if (!message.trim()) {
      throw new EmptyMessageError();
    }
    this.assertIdle(session);

    const templates = getPromptTemplates(session.language);
    const owner = this.captureOwner(session);
    const firstExchange = !owner.turns.some(turn => turn.role === 'assistant');
    this.appendTurn(owner.turns, 'user', message);

    const messages = this.buildMessages(templates.systemPrompt, owner.turns);
    let reply = await this.complete(session, messages);

    if (firstExchange) {
      reply = `${templates.welcome}\n\n${reply}`;
    }

    this.appendTurn(owner.turns, 'assistant', reply);
    await this.persist(owner, message, reply);

    return { reply, turns: [...owner.turns] };
  }

  /**
   * Summary of the whole transcript. The transcript travels inside a reasoning
   * block of the request, so none of it is echoed back into the reply.
   */
  async wrapUp(session: SessionContext): Promise<Exchange> {
    if (session.turns.length === 0) {
      throw new EmptyTranscriptError();
    }
    this.assertIdle(session);

    const templates = getPromptTemplates(session.language);
    const owner = this.captureOwner(session);
    const transcript = this.buildTranscript(owner.turns);
    this.appendTurn(owner.turns, 'user', WRAP_UP_LABEL);

    const messages: ChatMessage[] = [
      { role: 'system', content: templates.wrapUpSystemPrompt },
      { role: 'user', content: templates.wrapUpPrompt(transcript) }
    ];
    const reply = await this.complete(session, messages);

    this.appendTurn(owner.turns, 'assistant', reply);
    await this.persist(owner, WRAP_UP_LABEL, reply);

    return { reply, turns: [...owner.turns] };
  }

  buildMessages(systemPrompt: string, turns: Turn[]): ChatMessage[] {
    return [
      { role: 'system', content: systemPrompt },
      ...turns.map((turn): ChatMessage => ({ role: turn.role, content: turn.content }))
    ];
  }

  /** "Patient: ..." / "Martin: ..." lines, each newline-terminated */
  buildTranscript(turns: Turn[]): string {
    return turns
      .map(turn => `${turn.role === 'user' ? 'Patient' : 'Martin'}: ${turn.content}\n`)
      .join('');
  }

  private assertIdle(session: SessionContext): void {
    if (session.phase === 'awaiting_reply') {
      throw new ReplyPendingError();
    }
  }

  /**
   * The identity and transcript the exchange started with. The reply lands
   * there even if the session is rebound while it is pending.
   */
  private captureOwner(session: SessionContext): ExchangeOwner {
    return {
      identifier: session.authenticated ? session.identifier : '',
      turns: session.turns
    };
  }

  private appendTurn(turns: Turn[], role: Turn['role'], content: string): void {
    turns.push({ role, content, timestamp: this.now().toISOString() });
  }

  private async complete(session: SessionContext, messages: ChatMessage[]): Promise<string> {
    session.phase = 'awaiting_reply';
    try {
      const raw = await this.inference.complete({
        model: this.settings.model,
        messages,
        temperature: this.settings.temperature
      });
      const { text, reasoning } = scanReasoning(raw);
      if (reasoning.length > 0) {
        Logger.inference(`[Dialogue] Stripped ${reasoning.length} reasoning block(s) from reply for session ${session.sessionId}`);
      }
      return text;
    } finally {
      session.phase = 'chatting';
    }
  }

  private async persist(owner: ExchangeOwner, prompt: string, reply: string): Promise<void> {
    if (!owner.identifier) {
      return;
    }
    await this.log.appendTurn(owner.identifier, prompt, reply, this.settings.model);
  }
}
