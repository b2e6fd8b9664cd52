export type ProductCategory = 'loose_weight_perishable' | 'fixed_weight';

export type StoreSection =
  | 'produce'
  | 'meat'
  | 'bakery'
  | 'dairy'
  | 'grocery'
  | 'beverages'
  | 'cleaning'
  | 'hygiene';

export type UnitOfSale = 'kg' | 'unit';

export interface Product {
  productId: string; // EAN
  name: string;
  category: ProductCategory;
  section: StoreSection;
  unitOfSale: UnitOfSale;
  deliveryEligible: boolean; // false = store pickup only
  promotional?: boolean;
}

export interface PriceQuote {
  productId: string;
  unitPrice: number; // per kg or per unit, following product.unitOfSale
  quantityAvailable: number;
  quotedAt: Date;
}

export const APPROXIMATE_MASS_NOTICE = 'approximate — final value may vary at the scale';

export interface MassEstimate {
  massKg: number;
  unitMassKg: number;
  unitCount: number;
  source: 'product' | 'section_default';
  approximate: true;
  notice: typeof APPROXIMATE_MASS_NOTICE;
}

export type Resolution =
  | { kind: 'unique'; product: Product }
  | { kind: 'ambiguous'; candidates: Product[] }
  | { kind: 'not_found'; timedOut?: boolean };

export interface BatchItemResult {
  query: string;
  resolution: Resolution;
  quote: PriceQuote | null;
  quoteError?: 'ORACLE_UNAVAILABLE';
}

export type RequestedUnit = 'unit' | 'kg';

export interface CartLine {
  lineId: string;
  product: Product;
  requestedQuantity: number;
  requestedUnit: RequestedUnit;
  massEstimate?: MassEstimate;
  chargeableQuantity: number; // kg for products sold by mass, item count otherwise
  unitPrice: number; // price snapshot from the latest quote
  subtotal: number;
  note: string;
  stockShortfall?: boolean;
  quotedAt: Date;
  addedAt: Date;
}

export type SessionState =
  | 'draft'
  | 'reviewing_summary'
  | 'awaiting_delivery_info'
  | 'awaiting_payment_selection'
  | 'awaiting_payment_confirmation'
  | 'submitted'
  | 'cancelled';

export type PaymentMethod = 'pix' | 'cash' | 'card';

export type PaymentTiming = 'prepaid' | 'on_delivery';

export interface DeliveryInfo {
  recipientName?: string;
  address?: string;
  neighborhood?: string;
  fee?: number;
}

export interface PaymentSelection {
  method: PaymentMethod;
  timing: PaymentTiming;
  proofRef?: string;
}

export interface Session {
  sessionId: string;
  customerId: string;
  state: SessionState;
  lines: CartLine[];
  subtotal: number;
  deliveryFee: number;
  total: number;
  delivery: DeliveryInfo;
  payment?: PaymentSelection;
  createdAt: Date;
  lastActivityAt: Date;
  lastFinalizedAt: Date | null;
  lastOrderId?: string; // the order intake knows; amendments replace it in place
  amendsOrderId?: string;
  pendingOrderId?: string; // reused until intake accepts the order
  receivedPaymentProof?: string; // PIX proof kept across a return to review
}

export type SessionOpenOutcome = 'created' | 'continued' | 'amending' | 'expired_as_new_order';

export interface OpenedSession {
  session: Session;
  outcome: SessionOpenOutcome;
}

export interface DeliveryZone {
  neighborhood: string;
  fee: number;
}

export type ZoneLookup = { served: true; zone: DeliveryZone } | { served: false; neighborhood: string };

export type PaymentClass = 'variable_weight' | 'fixed_weight_only';

export interface PaymentOption {
  method: PaymentMethod;
  timing: PaymentTiming;
  requiresProof: boolean;
}

export interface CartSummary {
  customerId: string;
  state: SessionState;
  lines: CartLine[];
  subtotal: number;
  deliveryFee: number;
  total: number;
  paymentClass: PaymentClass;
  hasEstimatedWeights: boolean;
}

export interface Order {
  readonly orderId: string;
  readonly sessionId: string;
  readonly customerId: string;
  readonly lines: readonly Readonly<CartLine>[];
  readonly delivery: Readonly<Required<DeliveryInfo>>;
  readonly payment: Readonly<PaymentSelection>;
  readonly subtotal: number;
  readonly deliveryFee: number;
  readonly total: number;
  readonly hasEstimatedWeights: boolean;
  readonly amendsOrderId?: string;
  readonly receivedPaymentProof?: string;
  readonly createdAt: Date;
}

export interface LineChange {
  lineId: string;
  productId: string;
  reason: 'repriced' | 'out_of_stock';
  previousUnitPrice: number;
  currentUnitPrice: number | null;
  quantityAvailable: number;
}

export type SubmitOutcome =
  | { status: 'submitted'; order: Order }
  | { status: 'stale'; changes: LineChange[]; summary: CartSummary };

export interface AddItemRequest {
  productId: string;
  quantity: number;
  unit?: RequestedUnit;
  note?: string;
}

export interface DeliveryInfoRequest {
  recipientName?: string;
  address?: string;
  neighborhood?: string;
}

export interface SelectPaymentRequest {
  method: PaymentMethod;
  timing?: PaymentTiming;
}
