/** Keep in step with packages/core/package.json */
export const VERSION = '0.1.0';
