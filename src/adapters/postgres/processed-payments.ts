import type { Pool } from "pg";
import type { ProcessedPaymentStorePort } from "../../ports/processed-payments.js";

export class PostgresProcessedPaymentStore implements ProcessedPaymentStorePort {
  constructor(private readonly pool: Pool) {}

  async insertIfAbsent(paymentId: string, processedAt: string): Promise<boolean> {
    const result = await this.pool.query(
      `
        INSERT INTO fl_processed_payments (payment_id, processed_at)
        VALUES ($1, $2::timestamptz)
        ON CONFLICT (payment_id) DO NOTHING
      `,
      [paymentId, processedAt],
    );
    return (result.rowCount ?? 0) === 1;
  }

  async has(paymentId: string): Promise<boolean> {
    const result = await this.pool.query(
      "SELECT 1 FROM fl_processed_payments WHERE payment_id = $1",
      [paymentId],
    );
    return result.rows.length > 0;
  }
}
