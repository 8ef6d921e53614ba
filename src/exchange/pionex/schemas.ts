import { z } from 'zod';

/** 거래소는 숫자를 문자열로 주는 경우가 많다 → number 강제 변환 */
const decimal = z.coerce.number().finite();
const idString = z.union([z.string(), z.number()]).transform((v) => String(v));

// ─── 공통 envelope ──────────────────────────────────────────────────────

/** { result, code?, message?, data? }: result=false면 업무 거절 */
export const envelopeSchema = z.object({
  result: z.boolean(),
  code: z.union([z.string(), z.number()]).transform((v) => String(v)).optional(),
  message: z.string().optional(),
  data: z.unknown().optional(),
  timestamp: z.number().optional(),
});
export type Envelope = z.infer<typeof envelopeSchema>;

// ─── PUBLIC 응답 (data 부분) ────────────────────────────────────────────

export const tickerItemSchema = z.object({
  symbol: z.string(),
  close: decimal,
  open: decimal.optional(),
  high: decimal.optional(),
  low: decimal.optional(),
  time: z.number().optional(),
});
export const tickersDataSchema = z.object({
  tickers: z.array(tickerItemSchema).min(1),
});

export const bookTickerItemSchema = z.object({
  symbol: z.string(),
  bidPrice: decimal.positive(),
  bidSize: decimal.optional(),
  askPrice: decimal.positive(),
  askSize: decimal.optional(),
  timestamp: z.number().optional(),
});
export const bookTickersDataSchema = z.object({
  tickers: z.array(bookTickerItemSchema).min(1),
});

export const tradeItemSchema = z.object({
  symbol: z.string(),
  price: decimal.positive(),
  size: decimal.optional(),
  side: z.enum(['BUY', 'SELL']).optional(),
  timestamp: z.number().optional(),
});
export const tradesDataSchema = z.object({
  trades: z.array(tradeItemSchema).min(1),
});

export const symbolInfoSchema = z.object({
  symbol: z.string(),
  basePrecision: z.coerce.number().int().nonnegative(),
  quotePrecision: z.coerce.number().int().nonnegative(),
  minTradeSize: decimal.nonnegative(),
  maxTradeSize: decimal.nonnegative().optional(),
  minAmount: decimal.nonnegative().optional(),
  enable: z.boolean().optional(),
});
export const symbolsDataSchema = z.object({
  symbols: z.array(symbolInfoSchema),
});

// ─── PRIVATE 응답 (data 부분) ───────────────────────────────────────────

export const orderPlacedDataSchema = z.object({
  orderId: idString,
  clientOrderId: z.string().optional(),
});

/** DELETE 응답: data가 없거나 orderId만 온다 */
export const orderCancelDataSchema = z
  .object({ orderId: idString.optional() })
  .passthrough()
  .optional();

export const orderDataSchema = z.object({
  orderId: idString,
  symbol: z.string(),
  type: z.enum(['MARKET', 'LIMIT']),
  side: z.enum(['BUY', 'SELL']),
  price: decimal.optional(),
  size: decimal.optional(),
  amount: decimal.optional(),
  filledSize: decimal.default(0),
  filledAmount: decimal.default(0),
  status: z.enum(['OPEN', 'CLOSED']),
  clientOrderId: z.string().optional(),
});
export type OrderData = z.infer<typeof orderDataSchema>;

export const openOrdersDataSchema = z.object({
  orders: z.array(orderDataSchema),
});

export const fillItemSchema = z.object({
  id: idString.optional(),
  orderId: idString,
  symbol: z.string(),
  side: z.enum(['BUY', 'SELL']),
  price: decimal,
  size: decimal,
  fee: decimal.default(0),
  timestamp: z.number().default(0),
});
export type FillData = z.infer<typeof fillItemSchema>;

export const fillsDataSchema = z.object({
  fills: z.array(fillItemSchema),
});

export const balanceItemSchema = z.object({
  coin: z.string(),
  free: decimal,
  frozen: decimal.default(0),
});
export const balancesDataSchema = z.object({
  balances: z.array(balanceItemSchema),
});
