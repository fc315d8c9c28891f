/** Masks and secret keys are drawn from `[1, MASK_RANGE]`. */
export const MASK_RANGE = 2n ** 30n;

export const DEFAULT_APP_NAME = "ring-sum";

export type AggregateMode = "sum" | "mean";

/**
   A counter in the private record. `min` and `max` bound the values
   the bootstrap generator draws for it.
 */
export interface FieldSpec {
  name: string;
  min: number;
  max: number;
}

export const DEMO_FIELDS: readonly FieldSpec[] = Object.freeze([
  { name: "view_time", min: 10, max: 20 },
  { name: "average_views_per_day", min: 1, max: 5 },
  { name: "num_movies_watched", min: 5, max: 10 },
  { name: "num_movies_rated", min: 0, max: 5 },
]);
