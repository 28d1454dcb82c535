import type {
  NotificationEvent,
  Product,
  StockObservation,
  StoredState,
  TransitionKind,
} from '@stockwatch/shared';

export interface NotificationPolicy {
  notifyOutOfStock: boolean;
}

export function detectTransition(
  previous: Pick<StoredState, 'status'> | null,
  current: Pick<StockObservation, 'status'>,
): TransitionKind {
  if (!previous) return 'first_observation';
  if (previous.status === current.status) return 'no_change';
  return current.status === 'available' ? 'restock' : 'out_of_stock';
}

/**
 * Builds the event to dispatch for a transition, or null when the policy
 * stays silent. First observations only seed state.
 */
export function toNotificationEvent(
  kind: TransitionKind,
  product: Product,
  previous: StoredState | null,
  observation: StockObservation,
  policy: NotificationPolicy,
): NotificationEvent | null {
  if (!previous) return null;
  if (kind === 'restock' || (kind === 'out_of_stock' && policy.notifyOutOfStock)) {
    return {
      kind,
      product,
      previousStatus: previous.status,
      currentStatus: observation.status,
      observation,
      occurredAt: observation.observedAt,
    };
  }
  return null;
}
