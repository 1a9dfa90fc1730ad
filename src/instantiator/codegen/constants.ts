export const DURATION_TICKS_FIELD_NAME = "c_durationTicks";
export const COMPOSITOR_FIELD_NAME = "_c";
export const SINGLETON_EXPRESSION_ANIMATION_FIELD_NAME =
  "_reusableExpressionAnimation";

/** 100 ns ticks per millisecond. */
export const TICKS_PER_MILLISECOND = 10_000;

export const millisecondsToTicks = (milliseconds: number): number =>
  Math.round(milliseconds * TICKS_PER_MILLISECOND);
