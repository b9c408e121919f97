/**
 * Session Manager
 *
 * In-memory conversation history per session id, trimmed to the most
 * recent exchanges.
 */

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export class SessionManager {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private counter = 0;
  private readonly maxTurns: number;

  /**
   * @param maxHistory - Exchanges (user + assistant pairs) to remember per session
   */
  constructor(maxHistory: number) {
    this.maxTurns = Math.max(0, maxHistory) * 2;
  }

  /**
   * Start a new, empty session.
   *
   * @returns an id of the form `session_<n>`
   */
  createSession(): string {
    this.counter += 1;
    const id = `session_${this.counter}`;
    this.sessions.set(id, []);
    return id;
  }

  hasSession(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Append one message. Unknown ids start a new session.
   */
  addMessage(id: string, role: ConversationTurn['role'], content: string): void {
    const turns = this.sessions.get(id) ?? [];
    turns.push({ role, content });
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns);
    }
    this.sessions.set(id, turns);
  }

  addExchange(id: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(id, 'user', userMessage);
    this.addMessage(id, 'assistant', assistantMessage);
  }

  /**
   * History as `User: ...` / `Assistant: ...` lines, or null when there is none.
   */
  getConversationHistory(id: string | undefined): string | null {
    if (id === undefined) {
      return null;
    }
    const turns = this.sessions.get(id);
    if (!turns || turns.length === 0) {
      return null;
    }
    return turns
      .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
      .join('\n');
  }

  clearSession(id: string): void {
    if (this.sessions.has(id)) {
      this.sessions.set(id, []);
    }
  }
}
