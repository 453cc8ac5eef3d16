import { env } from './env.js';

export { env };
export type { AppEnvironment } from './env.js';

// Export commonly used config values
export const thumbnailPixelBudget = (): number => env.THUMBNAIL_PIXEL_BUDGET;
