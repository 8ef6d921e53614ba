export type {
  OrderSide,
  OrderType,
  OrderStatus,
  OrderKind,
  PlacedOrder,
  OrderInfo,
  Fill,
  MarketOrderRequest,
  LimitOrderRequest,
  PendingOrder,
} from './order.js';
export type { BookTicker, Balance, ExchangeRules, PricePoint } from './market.js';
export type { SignalMode, Signal, TickStats, SignalDecision } from './signal.js';
export type { SymbolState, ExitReason, ExitDecision, Stops } from './position.js';
export { emptySymbolState } from './position.js';
export type { RiskCheck, PositionState, TradeOutcome, DailyStats } from './risk.js';
export type { SpotExchange } from './exchange.js';
