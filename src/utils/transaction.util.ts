import { Knex } from 'knex';
import { Errors, isRetryableConflict } from './error-handler.util';

/**
 * Run `work` inside the caller's transaction when one is given, otherwise in a new one.
 * Serialization failures of a transaction opened here surface as CONFLICT.
 */
export async function inTransaction<T>(
  db: Knex,
  work: (trx: Knex.Transaction) => Promise<T>,
  trx?: Knex.Transaction
): Promise<T> {
  if (trx) {
    return work(trx);
  }
  try {
    return await db.transaction(work);
  } catch (error) {
    if (isRetryableConflict(error)) {
      throw Errors.conflict('Concurrent update detected, retry the request');
    }
    throw error;
  }
}
