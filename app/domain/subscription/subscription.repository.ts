import type { SubscriptionStatusType } from "../../types/enums";
import type { Subscription } from "./subscription.entity";

export interface CreateSubscriptionData {
  storeId: string;
  externalSubscriptionId: string;
  status: SubscriptionStatusType;
  priceId: string | null;
  customerId: string | null;
  paymentMethodId: string | null;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  cancelAtPeriodEnd: boolean;
  canceledAt: Date | null;
  metadata: Record<string, string>;
}

export type UpdateSubscriptionData = Partial<Omit<CreateSubscriptionData, "storeId" | "externalSubscriptionId">>;

export interface ISubscriptionRepository<Tx> {
  findByExternalId(externalSubscriptionId: string, tx?: Tx): Promise<Subscription | null>;

  create(data: CreateSubscriptionData, tx?: Tx): Promise<Subscription>;

  update(id: string, data: UpdateSubscriptionData, tx?: Tx): Promise<Subscription | null>;
}
