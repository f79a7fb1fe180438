// Shared limits and denominators for the vault, its adapters and the in-process pools

export const MAX_UINT64: bigint = 18_446_744_073_709_551_615n;
export const SCALE: bigint = 1_000_000_000_000n;          // 1e12 for share price display precision
export const BIPS_DIVISOR: bigint = 10_000n;              // Basis points denominator (10000 = 100%)
export const MAX_SLIPPAGE_BPS: bigint = 1_000n;           // Max 10% slippage allowed
export const DEFAULT_SLIPPAGE_BPS: bigint = 100n;         // 1% default conversion tolerance
