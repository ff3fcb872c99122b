// Physical constants shared by the engine formulas
export const STANDARD_GRAVITY = 9.81; // m/s², g₀ used for Isp
export const SEA_LEVEL_PRESSURE = 101_325; // Pa

// Barometric fit for the lower atmosphere: p = p₀ · (1 − L·h)^n
export const PRESSURE_LAPSE = 2.25577e-5; // 1/m
export const PRESSURE_EXPONENT = 5.25588;
