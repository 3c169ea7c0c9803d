/** Transient lock or serialization conflict in the ledger store; safe to retry. */
export class LedgerContentionError extends Error {
  constructor(message: string, readonly sqlState?: string) {
    super(message);
    this.name = "LedgerContentionError";
  }
}
