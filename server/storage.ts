import { eq, desc } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import {
  combustionRuns,
  combustionSettings,
  type CombustionRun,
  type InsertCombustionRun,
  type CombustionSetting,
  type InsertCombustionSetting,
} from "@shared/schema";

const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
});

export const db = drizzle(pool);

export interface IStorage {
  // Combustion runs
  getAllCombustionRuns(): Promise<CombustionRun[]>;
  getCombustionRun(id: string): Promise<CombustionRun | undefined>;
  createCombustionRun(run: InsertCombustionRun): Promise<CombustionRun>;
  deleteCombustionRun(id: string): Promise<void>;

  // Settings
  getAllSettings(): Promise<CombustionSetting[]>;
  getSetting(key: string): Promise<CombustionSetting | undefined>;
  upsertSetting(setting: InsertCombustionSetting): Promise<CombustionSetting>;
}

export class DatabaseStorage implements IStorage {
  // Combustion runs
  async getAllCombustionRuns(): Promise<CombustionRun[]> {
    return db.select().from(combustionRuns).orderBy(desc(combustionRuns.createdAt));
  }

  async getCombustionRun(id: string): Promise<CombustionRun | undefined> {
    const result = await db.select().from(combustionRuns).where(eq(combustionRuns.id, id));
    return result[0];
  }

  async createCombustionRun(run: InsertCombustionRun): Promise<CombustionRun> {
    const result = await db.insert(combustionRuns).values(run).returning();
    return result[0];
  }

  async deleteCombustionRun(id: string): Promise<void> {
    await db.delete(combustionRuns).where(eq(combustionRuns.id, id));
  }

  // Settings
  async getAllSettings(): Promise<CombustionSetting[]> {
    return db.select().from(combustionSettings).orderBy(combustionSettings.key);
  }

  async getSetting(key: string): Promise<CombustionSetting | undefined> {
    const result = await db.select().from(combustionSettings).where(eq(combustionSettings.key, key));
    return result[0];
  }

  async upsertSetting(setting: InsertCombustionSetting): Promise<CombustionSetting> {
    const result = await db
      .insert(combustionSettings)
      .values(setting)
      .onConflictDoUpdate({
        target: combustionSettings.key,
        set: { value: setting.value, description: setting.description, updatedAt: new Date() },
      })
      .returning();
    return result[0];
  }
}

export const storage = new DatabaseStorage();
