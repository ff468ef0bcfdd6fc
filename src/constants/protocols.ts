/** Length of the all-out 3-minute test */
export const THREE_MINUTE_SECONDS = 180;

/** Gap between the 3-minute and 5-minute marks of the 3/5 test */
export const THREE_FIVE_GAP_SECONDS = 120;

/** Triangular area factor for a linear ramp */
export const RAMP_AREA_FACTOR = 0.5;

/** Minimum paired samples for a regression protocol */
export const MIN_FIT_POINTS = 2;
