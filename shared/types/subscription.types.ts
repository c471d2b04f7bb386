export type SubscriptionStatus = 'active' | 'expired' | 'cancelled' | 'pending' | 'paused';

export interface Subscription {
  readonly id: number;
  readonly userId: string;
  readonly productId: string;
  readonly transactionId: string;
  readonly purchaseToken: string;
  readonly status: SubscriptionStatus;
  readonly startDate: Date;
  readonly expirationDate: Date;
  readonly autoRenewing: boolean;
  readonly lastVerified: Date | null;
  readonly cancelledAt: Date | null;
  readonly renewalCount: number;
}

export interface SubscriptionInput {
  id?: number;
  userId: string;
  productId: string;
  transactionId: string;
  purchaseToken: string;
  status?: SubscriptionStatus;
  startDate: Date;
  expirationDate: Date;
  autoRenewing?: boolean;
  lastVerified?: Date | null;
  cancelledAt?: Date | null;
  renewalCount?: number;
}
