/**
 * Risk limits, loaded once per run
 */

export interface RiskLimits {
  /** Absolute net quantity allowed per instrument */
  maxPositionPerInstrument: number;
  maxOrderNotional: number;
  /** Live orders allowed across the whole account */
  maxOpenOrders: number;
  minOrderIntervalMs: number;
  minAvailableBalance: number;
}
