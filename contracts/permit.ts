// permit.ts - Signed allowances for deposit-with-permit
// The owner signs (with algosdk.signBytes, which prefixes "MX") a message binding
// asset, owner, spender, amount, nonce and deadline. Ledgers verify with algosdk.verifyBytes.

import algosdk from 'algosdk';

const PERMIT_PREFIX = new TextEncoder().encode('permit');

export interface PermitFields {
  assetId: bigint;
  owner: string;
  spender: string;
  amount: bigint;
  nonce: bigint;
  deadline: bigint;
}

export function permitMessage({ assetId, owner, spender, amount, nonce, deadline }: PermitFields): Uint8Array {
  const parts: Uint8Array[] = [
    PERMIT_PREFIX,
    algosdk.encodeUint64(assetId),
    algosdk.decodeAddress(owner).publicKey,
    algosdk.decodeAddress(spender).publicKey,
    algosdk.encodeUint64(amount),
    algosdk.encodeUint64(nonce),
    algosdk.encodeUint64(deadline),
  ];
  const message = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    message.set(part, offset);
    offset += part.length;
  }
  return message;
}

export function signPermit(fields: PermitFields, secretKey: Uint8Array): Uint8Array {
  return algosdk.signBytes(permitMessage(fields), secretKey);
}

export function verifyPermit(fields: PermitFields, signature: Uint8Array): boolean {
  return algosdk.verifyBytes(permitMessage(fields), signature, fields.owner);
}
