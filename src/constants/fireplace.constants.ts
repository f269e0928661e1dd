/**
 * Fireplace Constants
 *
 * Defaults and HomeKit ranges for fireplace characteristics.
 */

// =============================================================================
// Temperature Constants
// =============================================================================

/** Target temperature kept when the fire reports no mode parameter (°C) */
export const DEFAULT_TARGET_TEMPERATURE = 22;

/** HomeKit heating threshold minimum (°C) */
export const HOMEKIT_HEAT_TEMP_MIN = 5;

/** HomeKit heating threshold maximum (°C) */
export const HOMEKIT_HEAT_TEMP_MAX = 35;

/** HomeKit heating threshold step (°C) */
export const HOMEKIT_HEAT_TEMP_STEP = 0.5;

// =============================================================================
// Flame Constants
// =============================================================================

/** Flame speed levels (1-5) to HomeKit percentage multiplier */
export const FLAME_SPEED_TO_PERCENTAGE_MULTIPLIER = 20;

/** Minimum flame speed level */
export const FLAME_SPEED_MIN = 1;

/** Maximum flame speed level */
export const FLAME_SPEED_MAX = 5;

// =============================================================================
// Timer Constants
// =============================================================================

/** Default countdown when the timer switch is turned on (minutes) */
export const DEFAULT_TIMER_DURATION_MINUTES = 60;

/** Longest countdown the plugin will request (minutes) */
export const MAX_TIMER_DURATION_MINUTES = 1440;

/** Default boost length when boost is turned on without a stored duration (minutes) */
export const DEFAULT_BOOST_DURATION_MINUTES = 15;
