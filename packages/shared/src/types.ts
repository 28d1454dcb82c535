export type StockStatus = 'available' | 'unavailable';

export interface PincodeSelectors {
  modal: string;
  input: string;
  submitButton: string;
}

export interface StockSelectors {
  addToCart: string;
  soldOut: string;
  soldOutText: readonly string[];
  price: string;
  title: string;
}

export interface Product {
  id: string;
  name: string;
  url: string;
  useBrowser: boolean;
  pincode: string | null;
  pincodeSelectors: Partial<PincodeSelectors>;
  selectors: Partial<StockSelectors>;
}

export interface StockObservation {
  productId: string;
  status: StockStatus;
  price: string | null;
  title: string | null;
  /** Why the extractor settled on this status, shown in notifications */
  detail: string;
  observedAt: Date;
}

export interface StoredState {
  productId: string;
  status: StockStatus;
  price: string | null;
  title: string | null;
  observedAt: Date;
  /** Last time the status flipped (or the first observation) */
  changedAt: Date;
}

export type TransitionKind = 'first_observation' | 'restock' | 'out_of_stock' | 'no_change';

export interface NotificationEvent {
  kind: 'restock' | 'out_of_stock';
  product: Product;
  previousStatus: StockStatus;
  currentStatus: StockStatus;
  observation: StockObservation;
  occurredAt: Date;
}
