// packages/core/src/verify/index.ts -- barrel re-export

export { Verifier, formatFailures } from './verifier.js';
export type { VerifyOptions } from './verifier.js';
