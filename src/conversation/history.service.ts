import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConversationTurn, TurnRole } from '../common/types';

/** Sliding window of recent turns per session; the oldest turn is evicted first. */
@Injectable()
export class HistoryService {
  private sessions: Map<string, ConversationTurn[]> = new Map();
  private readonly window: number;

  constructor(private readonly configService: ConfigService) {
    this.window = this.configService.get<number>('HISTORY_WINDOW', 20);
  }

  appendTurn(sessionId: string, role: TurnRole, content: string): void {
    const turns = this.sessions.get(sessionId) ?? [];
    turns.push({ role, content });
    if (turns.length > this.window) {
      turns.splice(0, turns.length - this.window);
    }
    this.sessions.set(sessionId, turns);
  }

  getRecentTurns(sessionId: string): ConversationTurn[] {
    return (this.sessions.get(sessionId) ?? []).map((turn) => ({ ...turn }));
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
