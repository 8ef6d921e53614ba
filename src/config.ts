import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

type EnvMap = Record<string, string | undefined>;

function env(source: EnvMap, key: string, fallback: string): string {
  const v = source[key];
  return v !== undefined && v !== '' ? v : fallback;
}

function envNum(source: EnvMap, key: string, fallback: number): number {
  const v = source[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

function envBool(source: EnvMap, key: string, fallback: boolean): boolean {
  const v = source[key];
  if (v === undefined || v === '') return fallback;
  return v.toLowerCase() === 'true' || v === '1';
}

function envList(source: EnvMap, key: string, fallback: string[]): string[] {
  const v = source[key];
  if (v === undefined || v.trim() === '') return fallback;
  return v.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();
const percent = z.number().finite().nonnegative().max(100);

export const configSchema = z.object({
  exchange: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string(),
    apiSecret: z.string(),
    dryRun: z.boolean(),
    /** 스코프별 초당 허용 호출 수 (ip / account 각각) */
    rateLimitPerSec: z.number().int().positive(),
    timeoutMs: positive,
    /** 429/5xx 백오프 기준 (ms). 실제 대기 = min(상한, base * 2^attempt) */
    retryBaseMs: positive,
    maxServerRetries: z.number().int().nonnegative(),
  }),

  trading: z.object({
    symbols: z.array(z.string().min(1)).min(1),
    /** 포지션당 진입 금액 (quote 통화, 예: USDT) */
    positionUsdt: positive,
    maxOpenTrades: z.number().int().positive(),
    maxOpenTradesPerSymbol: z.number().int().positive(),
    checkIntervalSec: positive,
    cooldownSec: nonNegative,
    verifyAfterTrade: z.boolean(),
  }),

  signal: z.object({
    mode: z.enum(['contrarian', 'momentum']),
    /** zscore: EWM 변동성 기반 / percent: 단순 변화율 기준 */
    thresholdMode: z.enum(['zscore', 'percent']),
    lookbackSec: positive,
    confirmTicks: z.number().int().positive(),
    breakoutChangePercent: positive,
    ewmLambda: z.number().gt(0).lt(1),
    zThreshold: positive,
    dynamicZEnabled: z.boolean(),
    dynamicZPercentile: z.number().min(0).max(1),
    zHistorySize: z.number().int().positive(),
    volWindowSize: z.number().int().positive(),
    spreadFilterEnabled: z.boolean(),
    maxSpreadBps: nonNegative,
  }),

  exit: z.object({
    stopMode: z.enum(['fixed', 'atr']),
    stopLossPercent: percent,
    takeProfitPercent: nonNegative,
    atrWindowSec: positive,
    /** ATR 모드 SL 배수 (entry - alpha * avgMove) */
    atrStopMultiplier: positive,
    /** ATR 모드 TP 배수 (entry + beta * avgMove) */
    atrTakeProfitMultiplier: positive,
    hysteresisPercent: percent,
    minHoldSec: nonNegative,
    pullbackEnabled: z.boolean(),
    pullbackPercent: percent,
    trailingEnabled: z.boolean(),
    trailingActivationGainPercent: nonNegative,
    trailingRetracePercent: percent,
    /** 0이면 트레일링의 ATR 구간 비활성 */
    trailingAtrMultiplier: nonNegative,
    makerForTakeProfit: z.boolean(),
    makerForTrailing: z.boolean(),
  }),

  execution: z.object({
    preferMaker: z.boolean(),
    makerOffsetBps: nonNegative,
    entryLimitTimeoutMs: positive,
    exitLimitTimeoutMs: positive,
    pollIntervalMs: positive,
    /** 취소 후 체결 경합 확인 폴링 시간 */
    cancelConfirmMs: nonNegative,
  }),

  risk: z.object({
    /** 당일 누적 손실 한도 (quote 통화, 양수). 0이면 비활성 */
    maxDailyLoss: nonNegative,
    /** 연속 손실 한도. 0이면 비활성 */
    maxConsecutiveLosses: z.number().int().nonnegative(),
    coolOffSec: nonNegative,
    fundsHaltSec: nonNegative,
    /** |PnL| 이 값 이하면 0으로 간주 (dust) */
    pnlEpsilon: nonNegative,
  }),

  state: z.object({
    file: z.string().min(1),
  }),

  db: z.object({
    path: z.string().min(1),
  }),

  log: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),
});

export type EngineConfig = z.infer<typeof configSchema>;
export type SignalConfig = EngineConfig['signal'];
export type ExitConfig = EngineConfig['exit'];
export type ExecutionConfig = EngineConfig['execution'];
export type RiskConfig = EngineConfig['risk'];
export type TradingConfig = EngineConfig['trading'];

/**
 * env 맵 → 검증된 설정. 모든 필드는 여기서 기본값이 한 번 결정된다.
 * 잘못된 값이면 ZodError (기동 실패).
 */
export function buildConfig(source: EnvMap = process.env): EngineConfig {
  const raw = {
    exchange: {
      baseUrl: env(source, 'PIONEX_BASE_URL', 'https://api.pionex.com'),
      apiKey: env(source, 'API_KEY', ''),
      apiSecret: env(source, 'API_SECRET', ''),
      dryRun: envBool(source, 'DRY_RUN', true),
      rateLimitPerSec: envNum(source, 'RATE_LIMIT_PER_SEC', 10),
      timeoutMs: envNum(source, 'HTTP_TIMEOUT_MS', 10_000),
      retryBaseMs: envNum(source, 'RETRY_BASE_MS', 1000),
      maxServerRetries: envNum(source, 'MAX_SERVER_RETRIES', 5),
    },
    trading: {
      symbols: envList(source, 'SYMBOLS', ['BTC_USDT']),
      positionUsdt: envNum(source, 'POSITION_USDT', 25),
      maxOpenTrades: envNum(source, 'MAX_OPEN_TRADES', 3),
      maxOpenTradesPerSymbol: envNum(source, 'MAX_OPEN_TRADES_PER_SYMBOL', 1),
      checkIntervalSec: envNum(source, 'CHECK_INTERVAL_SEC', 4),
      cooldownSec: envNum(source, 'COOLDOWN_SEC', 60),
      verifyAfterTrade: envBool(source, 'VERIFY_AFTER_TRADE', true),
    },
    signal: {
      mode: env(source, 'SIGNAL_MODE', 'contrarian'),
      thresholdMode: env(source, 'THRESHOLD_MODE', 'zscore'),
      lookbackSec: envNum(source, 'BREAKOUT_LOOKBACK_SEC', 60),
      confirmTicks: envNum(source, 'BREAKOUT_CONFIRM_TICKS', 2),
      breakoutChangePercent: envNum(source, 'BREAKOUT_CHANGE_PERCENT', 1.0),
      ewmLambda: envNum(source, 'EWM_LAMBDA', 0.94),
      zThreshold: envNum(source, 'Z_THRESHOLD', 2.6),
      dynamicZEnabled: envBool(source, 'DYNAMIC_Z_ENABLED', true),
      dynamicZPercentile: envNum(source, 'DYNAMIC_Z_PERCENTILE', 0.7),
      zHistorySize: envNum(source, 'Z_HISTORY_SIZE', 600),
      volWindowSize: envNum(source, 'VOL_WINDOW_SIZE', 300),
      spreadFilterEnabled: envBool(source, 'SPREAD_FILTER_ENABLED', true),
      maxSpreadBps: envNum(source, 'ENTRY_MAX_SPREAD_BPS', 3.0),
    },
    exit: {
      stopMode: env(source, 'STOP_MODE', 'fixed'),
      stopLossPercent: envNum(source, 'STOP_LOSS_PERCENT', 2.0),
      takeProfitPercent: envNum(source, 'TAKE_PROFIT_PERCENT', 3.0),
      atrWindowSec: envNum(source, 'ATR_WINDOW_SEC', 120),
      atrStopMultiplier: envNum(source, 'ATR_SL_MULT', 1.5),
      atrTakeProfitMultiplier: envNum(source, 'ATR_TP_MULT', 2.5),
      hysteresisPercent: envNum(source, 'EXIT_HYSTERESIS_PERCENT', 0.1),
      minHoldSec: envNum(source, 'MIN_HOLD_SEC', 25),
      pullbackEnabled: envBool(source, 'TP_PULLBACK_ENABLED', false),
      pullbackPercent: envNum(source, 'TP_PULLBACK_PERCENT', 0.1),
      trailingEnabled: envBool(source, 'TRAILING_ENABLED', true),
      trailingActivationGainPercent: envNum(source, 'TRAILING_ACTIVATION_GAIN_PERCENT', 2.0),
      trailingRetracePercent: envNum(source, 'TRAILING_RETRACE_PERCENT', 0.25),
      trailingAtrMultiplier: envNum(source, 'TRAILING_ATR_MULT', 0),
      makerForTakeProfit: envBool(source, 'EXIT_MAKER_FOR_TP', true),
      makerForTrailing: envBool(source, 'EXIT_MAKER_FOR_TRAILING', true),
    },
    execution: {
      preferMaker: envBool(source, 'PREFER_MAKER', true),
      makerOffsetBps: envNum(source, 'MAKER_OFFSET_BPS', 2.0),
      entryLimitTimeoutMs: envNum(source, 'ENTRY_LIMIT_TIMEOUT_SEC', 3) * 1000,
      exitLimitTimeoutMs: envNum(source, 'EXIT_LIMIT_TIMEOUT_SEC', 2) * 1000,
      pollIntervalMs: envNum(source, 'ORDER_POLL_INTERVAL_MS', 200),
      cancelConfirmMs: envNum(source, 'CANCEL_CONFIRM_MS', 1000),
    },
    risk: {
      maxDailyLoss: envNum(source, 'RISK_MAX_DAILY_LOSS', 50),
      maxConsecutiveLosses: envNum(source, 'RISK_MAX_CONSECUTIVE_LOSSES', 3),
      coolOffSec: envNum(source, 'RISK_COOLOFF_SEC', 1800),
      fundsHaltSec: envNum(source, 'FUNDS_HALT_SEC', 300),
      pnlEpsilon: envNum(source, 'PNL_EPSILON', 1e-6),
    },
    state: {
      file: env(source, 'STATE_FILE', './data/runtime_state.json'),
    },
    db: {
      path: env(source, 'DB_PATH', './data/trades.db'),
    },
    log: {
      level: env(source, 'LOG_LEVEL', 'info'),
    },
  };

  return configSchema.parse(raw);
}

export const config: EngineConfig = buildConfig();
