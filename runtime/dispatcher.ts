/**
 * Delegated call dispatcher
 *
 * Separates whose code runs from whose storage is touched: the executor runs
 * a contract's code with every storage access bound to the store it is
 * handed. For a delegate call that is the caller's store; the callee's own
 * store is never read or written.
 */

import type { Hex } from 'viem';
import type { Contract, ExecutionContext, Storage } from './base';
import { revert } from './errors';

export interface CallFrame {
  /** address(this) seen by the running code */
  readonly self: string;
  readonly sender: string;
  readonly depth: number;
}

export class DelegateExecutor {
  constructor(private readonly maxCallDepth: number) {}

  /**
   * Run `fn` on `code` with all storage reads and writes going to `store`.
   * The store is handed over by reference, never copied.
   */
  execute<T>(code: Contract, store: Storage, frame: CallFrame, fn: () => T): T {
    if (frame.depth > this.maxCallDepth) {
      revert('CallDepthExceeded', `depth ${frame.depth} exceeds ${this.maxCallDepth}`);
    }
    const ctx: ExecutionContext = {
      storage: store,
      self: frame.self,
      sender: frame.sender,
      delegated: frame.self !== code.address,
      depth: frame.depth,
    };
    return code.runInContext(ctx, fn);
  }

  /**
   * Hand calldata to `code`, running against `store`. Returns the
   * ABI-encoded result; failures propagate unchanged.
   */
  delegateCall(code: Contract, store: Storage, frame: CallFrame, data: Hex): Hex {
    return this.execute(code, store, frame, () => code.handle(data));
  }
}
