/**
 * Pionex Open API REST 엔드포인트: 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */

export const PIONEX_REST_BASE = 'https://api.pionex.com';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 심볼 거래 규칙 (정밀도, 최소/최대 수량, 최소 금액) */
export const PUBLIC_SYMBOLS = '/api/v1/common/symbols';

/** GET 24시간 티커 */
export const PUBLIC_TICKERS = '/api/v1/market/tickers';

/** GET 최우선 호가 */
export const PUBLIC_BOOK_TICKERS = '/api/v1/market/bookTickers';

/** GET 최근 체결 */
export const PUBLIC_TRADES = '/api/v1/market/trades';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** POST 주문 / GET 개별 주문 조회 / DELETE 주문 취소 (동일 경로) */
export const PRIVATE_ORDER = '/api/v1/trade/order';

/** GET 미체결 주문 */
export const PRIVATE_OPEN_ORDERS = '/api/v1/trade/openOrders';

/** GET 체결 내역 (startTime/endTime ms, limit 파라미터 없음) */
export const PRIVATE_FILLS = '/api/v1/trade/fills';

/** GET 주문별 체결 내역 */
export const PRIVATE_FILLS_BY_ORDER = '/api/v1/trade/fillsByOrderId';

/** GET 잔고 */
export const PRIVATE_BALANCES = '/api/v1/account/balances';

// ─── 헤더 ───────────────────────────────────────────────────────────────

export const HEADER_API_KEY = 'PIONEX-KEY';
export const HEADER_SIGNATURE = 'PIONEX-SIGNATURE';
