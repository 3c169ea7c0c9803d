export interface RawProviderRequest {
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

export interface VerifiedPayment {
  internalPaymentId: string;
  providerPaymentId: string;
  amount: number;
  currency: string;
  succeeded: boolean;
}

export interface PaymentVerifierPort {
  readonly provider: string;
  /** Throws `AppError` 401/400 when the request cannot be trusted or parsed. */
  verify(request: RawProviderRequest): VerifiedPayment;
}
