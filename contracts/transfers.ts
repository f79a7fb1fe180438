import { TransferError } from './errors';
import { assert } from './math';
import type { AssetLedger } from './types';

export function safeTransfer(asset: AssetLedger, from: string, to: string, amount: bigint): void {
  assert(asset.transfer(from, to, amount), TransferError, `Transfer of ${amount} ${asset.name} failed`);
}

export function safeTransferFrom(
  asset: AssetLedger,
  spender: string,
  from: string,
  to: string,
  amount: bigint,
): void {
  assert(
    asset.transferFrom(spender, from, to, amount),
    TransferError,
    `Transfer of ${amount} ${asset.name} from ${from} failed`,
  );
}
