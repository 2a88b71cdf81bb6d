export { getEnv, parseEnv, resetEnv, type Env } from './env.js';
export { loadDriverConfig, type SignupDriverConfig, type PacingConfig } from './driver.js';
export { loadDetectionRules, DEFAULT_DETECTION_RULES, type DetectionRules } from './detection.js';
