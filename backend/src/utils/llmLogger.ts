import fs from 'fs/promises';
import path from 'path';

export interface LLMRequestLog {
  requestId: string;
  service: 'openai-compatible';
  model: string;
  temperature?: number;
  messageCount?: number;
  endpoint?: string;
  requestBody?: unknown;
}

export interface LLMResponseLog {
  requestId: string;
  service: 'openai-compatible';
  model: string;
  content?: string;
  error?: string;
  status?: number;
  duration?: number;
  tokenCount?: number;
}

export class LLMLogger {
  private logDir: string;
  private dirCreated: boolean = false;

  constructor(logDir: string = path.join(process.cwd(), 'logs', 'llm')) {
    this.logDir = logDir;
  }

  private async ensureLogDirectory() {
    if (!this.dirCreated) {
      try {
        await fs.mkdir(this.logDir, { recursive: true });
        this.dirCreated = true;
      } catch (error) {
        console.error('Failed to create log directory:', error);
      }
    }
  }

  // Date is taken per write so a long-running server rolls over at midnight
  private getLogFilePath(type: 'requests' | 'responses'): string {
    const date = new Date().toISOString().split('T')[0];
    return path.join(this.logDir, `${date}-${type}.log`);
  }

  private async append(type: 'requests' | 'responses', entry: Record<string, unknown>): Promise<void> {
    await this.ensureLogDirectory();

    const logLine = JSON.stringify({ timestamp: new Date().toISOString(), ...entry }) + '\n';

    try {
      await fs.appendFile(this.getLogFilePath(type), logLine);
    } catch (error) {
      console.error(`Failed to log ${type}:`, error);
    }
  }

  async logRequest(data: LLMRequestLog): Promise<void> {
    await this.append('requests', { type: 'REQUEST', ...data });
  }

  async logResponse(data: LLMResponseLog): Promise<void> {
    await this.append('responses', { type: 'RESPONSE', ...data });
  }
}

// Singleton instance
export const llmLogger = new LLMLogger();
