export { generateUlid, isValidUlid, assertUlid } from './ids';
export { toCents, fromCents, addMoney, subtractMoney, parseMoney, toMoneyString } from './money';
export { todayIso, isIsoDate, isFutureDate, rangesOverlap, daysAgo, toIsoTimestamp } from './date';
export {
  paginate,
  buildPagination,
  toPaginatedResult,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
} from './pagination';
export type { Pagination, PaginatedResult } from './pagination';
export { hashSecret, verifySecret, hashToken } from './secrets';
