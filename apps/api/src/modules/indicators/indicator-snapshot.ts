import { Injectable } from "@nestjs/common";
import type { IndicatorKind, IndicatorSnapshot } from "@paperbot/shared";
import { IndicatorIdSchema } from "@paperbot/shared";

import { ema, rsi, sma } from "./indicators";

export type ParsedIndicatorId = {
  id: string;
  kind: IndicatorKind;
  period: number;
};

const SERIES: Record<IndicatorKind, (prices: readonly number[], period: number) => Array<number | null>> = {
  sma,
  ema,
  rsi
};

export function parseIndicatorId(raw: string): ParsedIndicatorId {
  const id = IndicatorIdSchema.parse(raw.toLowerCase());
  const [kind, period] = id.split("_");
  switch (kind) {
    case "sma":
    case "ema":
    case "rsi":
      return { id, kind, period: Number.parseInt(period ?? "", 10) };
    default:
      throw new Error(`Unknown indicator kind in ${raw}`);
  }
}

export function computeIndicatorSeries(prices: readonly number[], rawId: string): Array<number | null> {
  const { kind, period } = parseIndicatorId(rawId);
  return SERIES[kind](prices, period);
}

/**
 * Latest value of each requested indicator over `prices`. Stateless: every call
 * recomputes from the sequence it is given.
 */
export function computeIndicatorSnapshot(prices: readonly number[], ids: readonly string[]): IndicatorSnapshot {
  const snapshot: Record<string, number | null> = {};
  for (const rawId of ids) {
    const { id } = parseIndicatorId(rawId);
    const series = computeIndicatorSeries(prices, id);
    const last = series.length > 0 ? series[series.length - 1] : null;
    snapshot[id] = last !== null && last !== undefined && Number.isFinite(last) ? last : null;
  }
  return Object.freeze(snapshot);
}

@Injectable()
export class IndicatorService {
  compute(prices: readonly number[], ids: readonly string[]): IndicatorSnapshot {
    return computeIndicatorSnapshot(prices, ids);
  }

  series(prices: readonly number[], ids: readonly string[]): Record<string, Array<number | null>> {
    const out: Record<string, Array<number | null>> = {};
    for (const rawId of ids) {
      const { id } = parseIndicatorId(rawId);
      out[id] = computeIndicatorSeries(prices, id);
    }
    return out;
  }
}
