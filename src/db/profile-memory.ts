// Long-term profile memory with embedding-ranked preference recall
import { createHash } from 'crypto';
import { and, desc, eq, ne } from 'drizzle-orm';
import type { AppDatabase } from '@/db';
import { profileMemories } from '@/db/schema';
import { logger } from '@/services/logger';
import { rankBySimilarity, type Embedder } from '@/services/providers/retrieval-vector-utils';
import type {
  ExtractedProfile,
  MacroTargets,
  PreferenceCategory,
  ProfileMemory,
  ProfileRecall,
  StoredPreference,
} from '@/types/nutrition';

export interface ProfileMemoryOptions {
  /** Minimum cosine similarity for a preference to be recalled. */
  minScore?: number;
  topK?: number;
  now?: () => Date;
}

/** Same user and same normalised text always map to the same id, so re-saving is an upsert. */
export function memoryId(userId: string, text: string): string {
  return createHash('md5').update(`${userId}-${text.toLowerCase().trim()}`).digest('hex');
}

export function describeProfile(fields: ExtractedProfile, macros: MacroTargets): string {
  const parts: string[] = [];
  if (fields.age != null) parts.push(`age ${fields.age}`);
  if (fields.sex) parts.push(fields.sex);
  if (fields.weight_kg != null) parts.push(`${fields.weight_kg} kg`);
  if (fields.height_cm != null) parts.push(`${fields.height_cm} cm`);
  if (fields.activity_level) parts.push(`activity: ${fields.activity_level}`);
  if (fields.goal) parts.push(`goal: ${fields.goal}`);
  if (fields.dietary_preferences.length) parts.push(`diet: ${fields.dietary_preferences.join(', ')}`);
  if (fields.medical_conditions.length) parts.push(`conditions: ${fields.medical_conditions.join(', ')}`);
  if (fields.allergies.length) parts.push(`allergies: ${fields.allergies.join(', ')}`);
  if (fields.dislikes.length) parts.push(`dislikes: ${fields.dislikes.join(', ')}`);
  if (fields.cuisine_preferences.length) parts.push(`cuisines: ${fields.cuisine_preferences.join(', ')}`);
  const targets =
    `daily targets ${macros.calories_kcal} kcal, protein ${macros.protein_g} g, ` +
    `carbs ${macros.carbs_g} g, fat ${macros.fat_g} g`;
  return parts.length ? `${parts.join('; ')}; ${targets}` : targets;
}

function preferenceItems(fields: ExtractedProfile): Array<{ text: string; category: PreferenceCategory; medical: boolean }> {
  return [
    ...fields.dietary_preferences.map((p) => ({ text: `Dietary preference: ${p}`, category: 'dietary_preference' as const, medical: false })),
    ...fields.allergies.map((a) => ({ text: `Allergic to ${a}`, category: 'allergy' as const, medical: true })),
    ...fields.medical_conditions.map((c) => ({ text: `Medical condition: ${c}`, category: 'medical_condition' as const, medical: true })),
    ...fields.dislikes.map((d) => ({ text: `Dislikes ${d}`, category: 'dislike' as const, medical: false })),
  ];
}

export class VectorProfileMemory implements ProfileMemory {
  private readonly minScore: number;
  private readonly topK: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: AppDatabase,
    private readonly embedder: Embedder,
    options: ProfileMemoryOptions = {},
  ) {
    this.minScore = options.minScore ?? 0.75;
    this.topK = options.topK ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  private async upsert(row: {
    userId: string;
    category: PreferenceCategory;
    text: string;
    medicalInfo: boolean;
    payload?: { fields: ExtractedProfile; macros: MacroTargets };
    createdAt: string;
  }): Promise<string> {
    const id = memoryId(row.userId, row.category === 'nutrition_profile' ? 'nutrition_profile' : row.text);
    const embedding = await this.embedder.embed(row.text);
    const values = { ...row, id, embedding, payload: row.payload ?? null };
    this.db
      .insert(profileMemories)
      .values(values)
      .onConflictDoUpdate({
        target: profileMemories.id,
        set: {
          text: values.text,
          medicalInfo: values.medicalInfo,
          payload: values.payload,
          embedding,
          createdAt: values.createdAt,
        },
      })
      .run();
    return id;
  }

  async saveProfile(
    userId: string,
    fields: ExtractedProfile,
    macros: MacroTargets,
  ): Promise<{ memoryIds: string[]; savedAt: string }> {
    const savedAt = this.now().toISOString();
    const memoryIds = [
      await this.upsert({
        userId,
        category: 'nutrition_profile',
        text: describeProfile(fields, macros),
        medicalInfo: fields.medical_conditions.length > 0 || fields.allergies.length > 0,
        payload: { fields, macros },
        createdAt: savedAt,
      }),
    ];
    for (const item of preferenceItems(fields)) {
      memoryIds.push(
        await this.upsert({ userId, category: item.category, text: item.text, medicalInfo: item.medical, createdAt: savedAt }),
      );
    }
    logger.info('profile_memory:saved', { userId, records: memoryIds.length });
    return { memoryIds, savedAt };
  }

  async savePreference(
    userId: string,
    text: string,
    category: PreferenceCategory,
    medicalInfo: boolean = false,
  ): Promise<string> {
    return this.upsert({ userId, category, text: text.trim(), medicalInfo, createdAt: this.now().toISOString() });
  }

  async deletePreference(userId: string, text: string): Promise<boolean> {
    const result = this.db
      .delete(profileMemories)
      .where(and(eq(profileMemories.id, memoryId(userId, text)), eq(profileMemories.userId, userId)))
      .run();
    return result.changes > 0;
  }

  async recallProfile(userId: string, context?: string): Promise<ProfileRecall | null> {
    const [profileRow] = this.db
      .select()
      .from(profileMemories)
      .where(and(eq(profileMemories.userId, userId), eq(profileMemories.category, 'nutrition_profile')))
      .orderBy(desc(profileMemories.createdAt))
      .limit(1)
      .all();

    const rows = this.db
      .select()
      .from(profileMemories)
      .where(and(eq(profileMemories.userId, userId), ne(profileMemories.category, 'nutrition_profile')))
      .all();

    let preferences: StoredPreference[];
    if (context && context.trim()) {
      const query = await this.embedder.embed(context);
      preferences = rankBySimilarity(query, rows, { minScore: this.minScore, topK: this.topK }).map((r) => ({
        id: r.id,
        category: r.category,
        text: r.text,
        medicalInfo: r.medicalInfo,
        score: r.score,
      }));
      // Medical constraints are always relevant to a meal plan.
      for (const row of rows) {
        if (row.medicalInfo && !preferences.some((p) => p.id === row.id)) {
          preferences.push({ id: row.id, category: row.category, text: row.text, medicalInfo: true });
        }
      }
    } else {
      preferences = rows.map((r) => ({ id: r.id, category: r.category, text: r.text, medicalInfo: r.medicalInfo }));
    }

    const profile =
      profileRow && profileRow.payload
        ? { fields: profileRow.payload.fields, macros: profileRow.payload.macros, savedAt: profileRow.createdAt }
        : null;

    if (!profile && preferences.length === 0) return null;
    return { profile, preferences };
  }
}
