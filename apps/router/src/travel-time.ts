/**
 * Flow-based travel time model.
 *
 * Below capacity, traffic moves at the speed limit. Above it, speed is the
 * smaller root of a * s^2 - b * s + flow = 0 (the congested branch of the
 * flow/speed curve).
 */

import {
  TRAVEL_TIME_MODEL,
  VOLUME_INTERVALS_PER_HOUR,
  freeFlowSeconds,
  type TravelTimeModel
} from "@roadsearch/config";
import type { Predictor } from "@roadsearch/pathfinding";

/**
 * Speed in km/h for a given hourly flow.
 */
export function speedForFlow(flow: number, model: TravelTimeModel = TRAVEL_TIME_MODEL): number {
  if (flow <= model.capacityFlow) {
    return model.speedLimitKmh;
  }
  // Flows past the curve's peak clamp to the speed at peak flow
  const discriminant = Math.max(model.b * model.b - 4 * model.a * flow, 0);
  const root = Math.sqrt(discriminant);
  return Math.min((model.b - root) / (2 * model.a), (model.b + root) / (2 * model.a));
}

/**
 * Travel time in seconds across `distanceKm` at hourly `flow`, including the
 * fixed intersection delay.
 */
export function flowToTime(flow: number, distanceKm: number, model: TravelTimeModel = TRAVEL_TIME_MODEL): number {
  if (flow <= model.capacityFlow) {
    return freeFlowSeconds(distanceKm, model);
  }
  return (Math.max(0, distanceKm) / speedForFlow(flow, model)) * 3600 + model.delayS;
}

export type FlowPredictorOptions = {
  model?: TravelTimeModel;
  intervalsPerHour?: number;
};

/**
 * Predictor that turns recent per-interval volume counts into a travel time
 * in minutes over the edge's static distance (km).
 */
export function createFlowPredictor(options: FlowPredictorOptions = {}): Predictor {
  const model = options.model ?? TRAVEL_TIME_MODEL;
  const intervalsPerHour = options.intervalsPerHour ?? VOLUME_INTERVALS_PER_HOUR;

  return (window, edge) => {
    if (window.length === 0) {
      throw new Error("flow predictor needs at least one observation");
    }
    if (edge.cost === undefined) {
      throw new Error(`edge (${String(edge.from)}, ${String(edge.to)}) has no distance`);
    }

    const meanVolume = window.reduce((sum, volume) => sum + volume, 0) / window.length;
    const flow = meanVolume * intervalsPerHour;
    return flowToTime(flow, edge.cost, model) / 60;
  };
}
