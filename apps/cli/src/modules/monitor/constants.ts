export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_HOUR = 3_600;
export const MS_PER_HOUR = 3_600_000;
export const MS_PER_DAY = 86_400_000;
export const HOURS_PER_DAY = 24;

/** Energy of a USDT transfer to a wallet that already holds USDT */
export const TX_COST_STANDARD = 65_000;
/** Energy of a USDT transfer to a wallet that has never held USDT */
export const TX_COST_FIRST_TIME = 131_000;
/** Daily transaction count used for the energy-needed reference figures */
export const REFERENCE_DAILY_TX = 800;

/** Relative error under which the measured regen rate matches the limit-based model */
export const LIMIT_MODEL_TOLERANCE = 0.1;
/** Relative error under which the measured regen rate matches the used-based model */
export const USED_MODEL_TOLERANCE = 0.15;

export const LIMIT_MODEL_FORMULA = 'E_limit / 86400';
export const USED_MODEL_FORMULA = 'E_used / T_recovery';
