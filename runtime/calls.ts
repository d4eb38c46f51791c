/**
 * Calldata helpers around viem's ABI codec
 */

import { decodeFunctionResult, encodeFunctionData, toFunctionSelector, type Abi, type Hex } from 'viem';

export const EMPTY_CALLDATA: Hex = '0x';

export function encodeCall(abi: Abi, functionName: string, args: readonly unknown[] = []): Hex {
  return encodeFunctionData({ abi, functionName, args });
}

export function decodeResult(abi: Abi, functionName: string, data: Hex): unknown {
  return decodeFunctionResult({ abi, functionName, data });
}

/**
 * Name of the ABI function whose selector starts `data`, if any
 */
export function functionNameOf(abi: Abi, data: Hex): string | undefined {
  const selector = data.slice(0, 10).toLowerCase();
  for (const item of abi) {
    if (item.type === 'function' && toFunctionSelector(item) === selector) {
      return item.name;
    }
  }
  return undefined;
}
