import models from '../../models/index.js';
import type { ChatMessage } from '../../types/index.js';

export interface ChatSessionRepository {
  findHistory(sessionId: string): Promise<ChatMessage[] | null>;
  saveHistory(sessionId: string, history: ChatMessage[]): Promise<void>;
  /** Resolves false when there was no such session. */
  remove(sessionId: string): Promise<boolean>;
}

const repo: ChatSessionRepository = {
  findHistory: async (sessionId) => {
    const row = await models.ChatSession.findByPk(sessionId);
    return row ? row.history : null;
  },

  saveHistory: async (sessionId, history) => {
    await models.ChatSession.upsert({ id: sessionId, history });
  },

  remove: async (sessionId) => {
    const deleted = await models.ChatSession.destroy({ where: { id: sessionId } });
    return deleted > 0;
  },
};

export default repo;
