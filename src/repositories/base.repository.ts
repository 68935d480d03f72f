import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { z } from 'zod';
import { Executor } from '../types';

export type RowValue = string | number | boolean | null;
export type RowData = Record<string, RowValue>;

export abstract class BaseRepository<T> {
  protected tableName: string;
  protected db: Knex;
  protected schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(tableName: string, db: Knex, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    this.tableName = tableName;
    this.db = db;
    this.schema = schema;
  }

  protected parse(row: unknown): T {
    return this.schema.parse(row);
  }

  protected parseOptional(row: unknown): T | null {
    return row === undefined || row === null ? null : this.parse(row);
  }

  protected parseMany(rows: unknown[]): T[] {
    return rows.map((row) => this.parse(row));
  }

  async findById(id: string, executor: Executor = this.db): Promise<T | null> {
    const row: unknown = await executor(this.tableName).where({ id }).first();
    return this.parseOptional(row);
  }

  /**
   * Insert a row and read it back. Ids are generated here, not by the database.
   */
  async create(data: RowData, executor: Executor = this.db): Promise<T> {
    const id = typeof data.id === 'string' ? data.id : randomUUID();
    await executor(this.tableName).insert({ ...data, id });
    const created = await this.findById(id, executor);
    if (!created) {
      throw new Error(`Inserted ${this.tableName} row ${id} could not be read back`);
    }
    return created;
  }

  async update(id: string, data: RowData, executor: Executor = this.db): Promise<T | null> {
    const updated = await executor(this.tableName).where({ id }).update(data);
    if (updated === 0) {
      return null;
    }
    return this.findById(id, executor);
  }
}

/**
 * Read the `count` column of an aggregate row (a string under pg, a number under SQLite).
 */
export function countOf(row: unknown): number {
  const parsed = z.object({ count: z.union([z.number(), z.string()]) }).safeParse(row);
  return parsed.success ? Number(parsed.data.count) : 0;
}
