// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

export interface TransactionalRepository {
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/**
 * "service": the callee opens and closes the transaction.
 * "external": the caller already holds one and the callee only runs its steps.
 */
export type TransactionOwner = "service" | "external";

export interface TransactionOptions {
  transactionOwner?: TransactionOwner;
}

/**
 * Runs the operation as one atomic unit. The first error thrown by any step
 * rolls back everything and is rethrown unchanged.
 */
export async function runInTransaction<T>(
  repository: TransactionalRepository,
  operation: () => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const transactionOwner = options.transactionOwner ?? "service";
  if (transactionOwner === "external") {
    return operation();
  }

  await repository.begin();

  try {
    const result = await operation();
    await repository.commit();
    return result;
  } catch (error) {
    await repository.rollback();
    throw error;
  }
}
