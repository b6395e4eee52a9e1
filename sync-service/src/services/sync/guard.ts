import { StorageError } from '../../errors/index.js';

// Любая ошибка драйвера/маппинга строк поднимается наружу как StorageError.
export async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof StorageError) throw e;
    throw new StorageError(operation, e);
  }
}
