/**
 * Upgrade authority tests
 *
 * Run with: npx vitest run test/upgrade.test.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ADMIN_SLOT,
  DelegateExecutor,
  ERC1967_SLOTS,
  Environment,
  IMPLEMENTATION_SLOT,
  Proxy,
  revert,
  slotToHex,
  encodeCall,
  transparentProxyAbi,
  type ExecutionContext,
  type UpgradePolicy,
} from '../runtime/index';
import { CounterV1, counterV1Abi } from '../contracts/CounterV1';
import { CounterV2, counterV2Abi } from '../contracts/CounterV2';
import { ADMIN, ATTACKER, OWNER, USER, expectRevert, read, readAddress, send } from './test-utils';

describe('UUPS upgrades', () => {
  let env: Environment;
  let v1: CounterV1;
  let v2: CounterV2;
  let proxy: Proxy;

  beforeEach(() => {
    env = new Environment();
    v1 = env.deploy(new CounterV1());
    v2 = env.deploy(new CounterV2());
    proxy = env.deployProxy(v1.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 5n]));
  });

  it('should let the owner repoint the proxy', () => {
    env.upgrade(OWNER, proxy.address, v2.address);

    expect(env.introspect(proxy.address).implementation).toBe(v2.address);
    expect(env.events.latest).toEqual({ name: 'Upgraded', args: { implementation: v2.address }, emitter: proxy.address });
    expect(read(env, proxy.address, counterV2Abi, 'getTotal')).toBe(5n);
  });

  it('should refuse anyone but the owner', () => {
    expectRevert(() => env.upgrade(ATTACKER, proxy.address, v2.address), 'Unauthorized');
    expect(env.introspect(proxy.address).implementation).toBe(v1.address);
  });

  it('should refuse a target without code', () => {
    expectRevert(() => env.upgrade(OWNER, proxy.address, USER), 'InvalidImplementation');
    expectRevert(() => env.upgrade(OWNER, proxy.address, '0x0000000000000000000000000000000000000000'), 'InvalidImplementation');
    expect(env.introspect(proxy.address).implementation).toBe(v1.address);
  });

  it('should refuse a target that cannot upgrade further', () => {
    const other = env.deployProxy(v1.address, '0x');
    expectRevert(() => env.upgrade(OWNER, proxy.address, other.address), 'InvalidImplementation');
  });

  it('should roll the pointer back when the post-upgrade call fails', () => {
    const eventsBefore = env.events.length;
    // initialize has already run on this proxy
    expectRevert(
      () => env.upgrade(OWNER, proxy.address, v2.address, encodeCall(counterV2Abi, 'initialize', [ATTACKER, 0n])),
      'AlreadyInitialized',
    );

    expect(env.introspect(proxy.address).implementation).toBe(v1.address);
    expect(env.events.length).toBe(eventsBefore);
    expect(read(env, proxy.address, counterV1Abi, 'getValue')).toBe(5n);
  });

  it('should run the post-upgrade call against the new implementation', () => {
    env.upgrade(OWNER, proxy.address, v2.address, encodeCall(counterV2Abi, 'initializeV2', [20n]));
    expect(read(env, proxy.address, counterV2Abi, 'getTotal')).toBe(25n);
    expect(env.initializationState(proxy.address)).toEqual({ kind: 'Initialized', epoch: 2n });
  });

  it('should refuse upgrades sent to the implementation directly', () => {
    const exposed = env.deploy(new CounterV1({ disableInitializers: false }));
    send(env, ATTACKER, exposed.address, counterV1Abi, 'initialize', [ATTACKER, 0n]);
    expectRevert(
      () => send(env, ATTACKER, exposed.address, counterV1Abi, 'upgradeToAndCall', [v2.address, '0x']),
      'UnauthorizedCallContext',
    );
  });

  it('should upgrade through the slots the proxy was deployed with', () => {
    const slots = { ...ERC1967_SLOTS, implementation: 12345n << 100n };
    const custom = env.deployProxy(v1.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 5n]), { slots });

    env.upgrade(OWNER, custom.address, v2.address);

    expect(env.introspect(custom.address).implementation).toBe(v2.address);
    expect(custom.storage.sload(slots.implementation)).toBe(BigInt(v2.address));
    expect(custom.storage.sload(IMPLEMENTATION_SLOT)).toBe(0n);
    expect(read(env, custom.address, counterV2Abi, 'getTotal')).toBe(5n);
  });

  it('should refuse upgrades delegated from something other than a proxy', () => {
    const executor = new DelegateExecutor(4);
    expectRevert(
      () =>
        executor.delegateCall(
          v1,
          proxy.storage,
          { self: '0x5000000000000000000000000000000000000005', sender: OWNER, depth: 1 },
          encodeCall(counterV1Abi, 'upgradeToAndCall', [v2.address, '0x']),
        ),
      'UnauthorizedCallContext',
    );
  });

  it('should answer proxiableUUID only outside a proxy', () => {
    expect(read(env, v1.address, counterV1Abi, 'proxiableUUID')).toBe(slotToHex(IMPLEMENTATION_SLOT));
    expectRevert(() => read(env, proxy.address, counterV1Abi, 'proxiableUUID'), 'UnauthorizedCallContext');
  });

  it('should let ownership changes move the upgrade right', () => {
    send(env, OWNER, proxy.address, counterV1Abi, 'transferOwnership', [ADMIN]);
    expectRevert(() => env.upgrade(OWNER, proxy.address, v2.address), 'Unauthorized');
    env.upgrade(ADMIN, proxy.address, v2.address);
    expect(env.introspect(proxy.address).implementation).toBe(v2.address);
  });

  it('should freeze upgrades after ownership is renounced', () => {
    send(env, OWNER, proxy.address, counterV1Abi, 'renounceOwnership');
    expectRevert(() => env.upgrade(OWNER, proxy.address, v2.address), 'Unauthorized');
  });
});

describe('transparent proxy upgrades', () => {
  let env: Environment;
  let v1: CounterV1;
  let v2: CounterV2;
  let proxy: Proxy;

  beforeEach(() => {
    env = new Environment();
    v1 = env.deploy(new CounterV1());
    v2 = env.deploy(new CounterV2());
    proxy = env.deployProxy(v1.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 1n]), { admin: ADMIN });
  });

  it('should record the admin in the ERC-1967 admin slot', () => {
    expect(env.introspect(proxy.address)).toEqual({ implementation: v1.address, admin: ADMIN });
    expect(proxy.storage.sload(ADMIN_SLOT)).toBe(BigInt(ADMIN));
  });

  it('should answer admin() and implementation() itself', () => {
    expect(readAddress(env, proxy.address, transparentProxyAbi, 'admin')).toBe(ADMIN);
    expect(readAddress(env, proxy.address, transparentProxyAbi, 'implementation')).toBe(v1.address);
  });

  it('should let the admin upgrade', () => {
    env.upgrade(ADMIN, proxy.address, v2.address, encodeCall(counterV2Abi, 'initializeV2', [2n]));
    expect(read(env, proxy.address, counterV2Abi, 'getTotal')).toBe(3n);
  });

  it('should refuse upgrades from anyone else, the owner included', () => {
    expectRevert(() => env.upgrade(OWNER, proxy.address, v2.address), 'Unauthorized');
    expectRevert(() => env.upgrade(ATTACKER, proxy.address, v2.address), 'Unauthorized');
    expect(env.introspect(proxy.address).implementation).toBe(v1.address);
  });

  it('should forward business calls from any sender', () => {
    send(env, USER, proxy.address, counterV1Abi, 'increment');
    expect(read(env, proxy.address, counterV1Abi, 'getValue', [], ADMIN)).toBe(2n);
  });

  it('should let the admin hand over the role', () => {
    send(env, ADMIN, proxy.address, transparentProxyAbi, 'changeAdmin', [OWNER]);
    expect(env.introspect(proxy.address).admin).toBe(OWNER);
    expect(env.events.latest).toEqual({
      name: 'AdminChanged',
      args: { previousAdmin: ADMIN, newAdmin: OWNER },
      emitter: proxy.address,
    });
    expectRevert(() => env.upgrade(ADMIN, proxy.address, v2.address), 'Unauthorized');
  });

  it('should refuse the zero address as admin', () => {
    expectRevert(
      () => send(env, ADMIN, proxy.address, transparentProxyAbi, 'changeAdmin', ['0x0000000000000000000000000000000000000000']),
      'InvalidAdmin',
    );
    expectRevert(() => send(env, ATTACKER, proxy.address, transparentProxyAbi, 'changeAdmin', [ATTACKER]), 'Unauthorized');
  });

  it('should accept a custom upgrade policy', () => {
    const allowed = new Set([USER]);
    const allowList: UpgradePolicy = {
      authorize(ctx: ExecutionContext): void {
        if (!allowed.has(ctx.sender)) {
          revert('Unauthorized', `${ctx.sender} is not on the allow list`);
        }
      },
    };
    const custom = env.deployProxy(v1.address, '0x', { admin: ADMIN, policy: allowList });

    expectRevert(() => env.upgrade(ADMIN, custom.address, v2.address), 'Unauthorized');
    env.upgrade(USER, custom.address, v2.address);
    expect(env.introspect(custom.address).implementation).toBe(v2.address);
  });
});
