// packages/common/src/transaction.ts

export type TxRunner = <T>(fn: () => Promise<T>) => Promise<T>;

export type Transactional = {
  runInTransaction?<T>(fn: () => Promise<T>): Promise<T>;
};

/** Runs inside the store's transaction when it has one, otherwise directly. */
export function transactionRunner(store: Transactional): TxRunner {
  return async (fn) => (store.runInTransaction ? store.runInTransaction(fn) : fn());
}
