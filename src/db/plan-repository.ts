// Conversation history and saved meal plans
import { and, desc, eq, isNotNull, like } from 'drizzle-orm';
import type { AppDatabase } from '@/db';
import { chatHistory } from '@/db/schema';
import { logger } from '@/services/logger';
import type { ChatMessage, ChatRole, PlanRecord, PlanRepository, SavedPlan } from '@/types/nutrition';

export const PLAN_MARKER = 'MEAL_PLAN_SAVED';

type ChatRow = typeof chatHistory.$inferSelect;

function toMessage(row: ChatRow): ChatMessage {
  return {
    id: row.id,
    userId: row.userId,
    sessionId: row.sessionId,
    role: row.role,
    content: row.content,
    createdAt: row.createdAt,
  };
}

/** Renders history as "User: ..." / "AI: ..." lines; system entries are skipped. */
export function formatHistoryForLlm(history: readonly ChatMessage[]): string {
  return history
    .filter((m) => m.role !== 'system')
    .map((m) => `${m.role === 'user' ? 'User' : 'AI'}: ${m.content}`)
    .join('\n');
}

export class SqlPlanRepository implements PlanRepository {
  constructor(
    private readonly db: AppDatabase,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async addMessage(userId: string, sessionId: string, role: ChatRole, content: string): Promise<number> {
    const [row] = this.db
      .insert(chatHistory)
      .values({ userId, sessionId, role, content, createdAt: this.now().toISOString() })
      .returning({ id: chatHistory.id })
      .all();
    return row.id;
  }

  async getSessionHistory(userId: string, sessionId: string, limit: number = 10): Promise<ChatMessage[]> {
    const rows = this.db
      .select()
      .from(chatHistory)
      .where(and(eq(chatHistory.userId, userId), eq(chatHistory.sessionId, sessionId)))
      .orderBy(desc(chatHistory.id))
      .limit(limit)
      .all();
    return rows.reverse().map(toMessage);
  }

  async recordPlan(record: PlanRecord): Promise<SavedPlan> {
    const { userId, sessionId, requestText, recipes, reply } = record;
    const savedAt = this.now().toISOString();
    const names = recipes.map((r) => r.name).join(', ');

    const planId = this.db.transaction((tx) => {
      tx.insert(chatHistory).values({ userId, sessionId, role: 'user', content: requestText, createdAt: savedAt }).run();
      const [row] = tx
        .insert(chatHistory)
        .values({
          userId,
          sessionId,
          role: 'system',
          content: `${PLAN_MARKER}: ${recipes.length} recipe options - ${names}`,
          metadata: { userRequest: requestText, recipes, timestamp: savedAt },
          createdAt: savedAt,
        })
        .returning({ id: chatHistory.id })
        .all();
      tx.insert(chatHistory).values({ userId, sessionId, role: 'assistant', content: reply, createdAt: savedAt }).run();
      return row.id;
    });

    logger.info('plans:saved', { userId, sessionId, recipes: recipes.length });
    return { planId, userId, sessionId, requestText, recipes, savedAt };
  }

  async listPlans(userId: string, limit: number = 10): Promise<SavedPlan[]> {
    const rows = this.db
      .select()
      .from(chatHistory)
      .where(
        and(
          eq(chatHistory.userId, userId),
          eq(chatHistory.role, 'system'),
          like(chatHistory.content, `${PLAN_MARKER}:%`),
          isNotNull(chatHistory.metadata),
        ),
      )
      .orderBy(desc(chatHistory.id))
      .limit(limit)
      .all();

    const plans: SavedPlan[] = [];
    for (const row of rows) {
      if (!row.metadata) continue;
      plans.push({
        planId: row.id,
        userId: row.userId,
        sessionId: row.sessionId,
        requestText: row.metadata.userRequest,
        recipes: row.metadata.recipes,
        savedAt: row.metadata.timestamp,
      });
    }
    return plans;
  }
}
