/**
 * Environment - hosts deployed contracts and runs calls against them
 *
 * Every external operation (deploy, call, upgrade) is one transaction: it
 * either commits all of its storage writes and events or, on any error,
 * restores every store and the event stream before rethrowing.
 *
 * @example
 * ```typescript
 * const env = new Environment();
 * const impl = env.deploy(new CounterV1(), { sender: deployer });
 * const proxy = env.deployProxy(impl.address, encodeCall(impl.abi, 'initialize', [owner, 0n]));
 *
 * env.call(owner, proxy.address, encodeCall(impl.abi, 'setValue', [42n]));
 * env.introspect(proxy.address).implementation; // impl.address
 * ```
 */

import type { Hex } from 'viem';
import type { Logger } from 'pino';
import {
  AddressAllocator,
  EventStream,
  normalizeAddress,
  type Contract,
  type ExecutionContext,
  type Host,
  type StorageSnapshot,
} from './base';
import { loadConfig } from './config';
import { DelegateExecutor } from './dispatcher';
import { isContractError, revert } from './errors';
import { decodeInitializationState, type InitializationState } from './Initializable';
import { decodeAddress } from './layout';
import { logger as rootLogger } from './logger';
import { ERC1967Proxy, Proxy, type ProxyOptions } from './Proxy';
import { INITIALIZABLE_SLOT } from './slots';
import { TransparentProxy, type UpgradePolicy } from './TransparentProxy';
import { encodeCall, EMPTY_CALLDATA, functionNameOf } from './calls';
import { upgradeAbi } from './ERC1967Upgrade';

export const DEFAULT_DEPLOYER = '0x00000000000000000000000000000000000d3701';

export interface EnvironmentOptions {
  /** Overrides PROXY_MAX_CALL_DEPTH */
  maxCallDepth?: number;
  events?: EventStream;
  logger?: Logger;
}

export interface DeployOptions {
  sender?: string;
}

export interface DeployProxyOptions extends ProxyOptions, DeployOptions {
  /** Deploys a TransparentProxy administered by this address */
  admin?: string;
  policy?: UpgradePolicy;
}

/**
 * The reserved-slot view of a proxy
 */
export interface ProxyRecord {
  implementation: string;
  admin: string;
}

export class Environment implements Host {
  readonly events: EventStream;
  private readonly instances: Map<string, Contract> = new Map();
  private readonly addresses = new AddressAllocator();
  private readonly executor: DelegateExecutor;
  private readonly log: Logger;

  constructor(options: EnvironmentOptions = {}) {
    this.events = options.events ?? new EventStream();
    this.executor = new DelegateExecutor(options.maxCallDepth ?? loadConfig().maxCallDepth);
    this.log = (options.logger ?? rootLogger).child({ component: 'environment' });
  }

  // =========================================================================
  // DEPLOYMENT
  // =========================================================================

  /**
   * Give `contract` an address and run its construction logic. A failure
   * during construction leaves nothing deployed.
   */
  deploy<T extends Contract>(contract: T, options: DeployOptions = {}): T {
    const deployer = normalizeAddress(options.sender ?? DEFAULT_DEPLOYER);
    const address = this.addresses.next(deployer);
    contract.attach(this, address);
    this.instances.set(address, contract);
    try {
      this.transact('deploy', () =>
        contract.runInContext(contract.ownContext(deployer), () => contract._afterDeploy()),
      );
    } catch (err) {
      this.instances.delete(address);
      contract.detach();
      throw err;
    }
    this.log.debug({ address, deployer, contract: contract.constructor.name }, 'deployed');
    return contract;
  }

  /**
   * Deploy a proxy in front of `implementation`, delegating `initData` to it
   * as part of construction when non-empty.
   */
  deployProxy(implementation: string, initData: Hex = EMPTY_CALLDATA, options: DeployProxyOptions = {}): Proxy {
    const { sender, admin, policy, slots } = options;
    const proxy = admin
      ? new TransparentProxy(implementation, initData, { admin, policy, slots })
      : new ERC1967Proxy(implementation, initData, { slots });
    return this.deploy(proxy, { sender });
  }

  // =========================================================================
  // CALLS
  // =========================================================================

  /**
   * Send calldata to a deployed contract. Proxies answer their own functions
   * and forward the rest.
   */
  call(sender: string, target: string, data: Hex): Hex {
    const code = this.codeAt(target);
    const from = normalizeAddress(sender);
    return this.transact('call', () => {
      this.log.debug({ target: code.address, sender: from, functionName: this.functionName(code, data) }, 'call');
      return this.executor.delegateCall(code, code.storage, { self: code.address, sender: from, depth: 0 }, data);
    });
  }

  /**
   * Repoint a proxy through its upgradeToAndCall entry point, wherever that
   * lives (the proxy for transparent proxies, the implementation for UUPS).
   */
  upgrade(sender: string, proxy: string, newImplementation: string, data: Hex = EMPTY_CALLDATA): void {
    const before = this.introspect(proxy).implementation;
    this.call(sender, proxy, encodeCall(upgradeAbi, 'upgradeToAndCall', [newImplementation, data]));
    this.log.debug({ proxy, from: before, to: this.introspect(proxy).implementation }, 'upgraded');
  }

  // =========================================================================
  // HOST
  // =========================================================================

  codeAt(address: string): Contract {
    const code = this.instances.get(normalizeAddress(address));
    if (!code) {
      revert('InvalidImplementation', `no code at ${address}`);
    }
    return code;
  }

  delegateCall(code: Contract, caller: ExecutionContext, data: Hex): Hex {
    return this.executor.delegateCall(
      code,
      caller.storage,
      { self: caller.self, sender: caller.sender, depth: caller.depth + 1 },
      data,
    );
  }

  // =========================================================================
  // INTROSPECTION
  // =========================================================================

  /**
   * Read a proxy's control slots directly, like eth_getStorageAt
   */
  introspect(proxy: string): ProxyRecord {
    const instance = this.codeAt(proxy);
    if (!(instance instanceof Proxy)) {
      throw new Error(`${instance.constructor.name} at ${proxy} is not a proxy`);
    }
    return {
      implementation: decodeAddress(instance.storage.sload(instance.slots.implementation)),
      admin: decodeAddress(instance.storage.sload(instance.slots.admin)),
    };
  }

  initializationState(address: string): InitializationState {
    return decodeInitializationState(this.codeAt(address).storage.sload(INITIALIZABLE_SLOT));
  }

  has(address: string): boolean {
    return this.instances.has(normalizeAddress(address));
  }

  /**
   * Resolve calldata against the target, then the implementation behind it.
   * Unknown selectors are reported as-is.
   */
  private functionName(code: Contract, data: Hex): string {
    const own = functionNameOf(code.abi, data);
    if (own !== undefined || !(code instanceof Proxy)) {
      return own ?? data.slice(0, 10);
    }
    const implementation = this.instances.get(decodeAddress(code.storage.sload(code.slots.implementation)));
    return (implementation && functionNameOf(implementation.abi, data)) ?? data.slice(0, 10);
  }

  // =========================================================================
  // TRANSACTIONS
  // =========================================================================

  private transact<T>(kind: string, fn: () => T): T {
    const snapshots = new Map<Contract, StorageSnapshot>();
    for (const instance of this.instances.values()) {
      snapshots.set(instance, instance.storage.snapshot());
    }
    const eventCount = this.events.length;
    try {
      return fn();
    } catch (err) {
      for (const [instance, snapshot] of snapshots) {
        instance.storage.restore(snapshot);
      }
      this.events.truncate(eventCount);
      this.log.warn(
        { kind, reason: isContractError(err) ? err.reason : undefined, err },
        `${kind} reverted`,
      );
      throw err;
    }
  }
}
