export { parseIsoDate, parseMonth, formatIsoDate, formatLocalDate, addDays, monthRange, trailingRange } from './date-parse.js';
export { normalizeDescription, labelKey } from './normalize.js';
export { sumAmounts, toAmountString, formatMoney } from './money.js';
export { trainingFingerprint } from './fingerprint.js';
