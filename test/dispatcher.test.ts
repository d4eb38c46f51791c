/**
 * Delegated execution tests
 *
 * Run with: npx vitest run test/dispatcher.test.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { maxUint256, type Hex } from 'viem';
import {
  ADDRESS_ZERO,
  AddressAllocator,
  DEFAULT_DEPLOYER,
  DelegateExecutor,
  ERC1967Proxy,
  Environment,
  INITIALIZABLE_SLOT,
  LOCKED_EPOCH,
  Storage,
  encodeCall,
  decodeResult,
  transparentProxyAbi,
} from '../runtime/index';
import { CounterV1, COUNTER_V1_LAYOUT, counterV1Abi } from '../contracts/CounterV1';
import { CounterV2, counterV2Abi } from '../contracts/CounterV2';
import { ADMIN, ATTACKER, OWNER, USER, expectRevert, read, send } from './test-utils';

describe('delegated execution', () => {
  let env: Environment;
  let impl: CounterV1;

  beforeEach(() => {
    env = new Environment();
    impl = env.deploy(new CounterV1());
  });

  it('should keep storage with the proxy', () => {
    const proxy = env.deployProxy(impl.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 0n]));
    const before = impl.storage.entries();

    send(env, USER, proxy.address, counterV1Abi, 'setValue', [42n]);

    expect(read(env, proxy.address, counterV1Abi, 'getValue')).toBe(42n);
    expect(proxy.storage.sload(COUNTER_V1_LAYOUT.slotOf('value'))).toBe(42n);
    expect(impl.storage.sload(COUNTER_V1_LAYOUT.slotOf('value'))).toBe(0n);
    expect(impl.storage.entries()).toEqual(before);
    expect(impl.storage.entries()).toEqual([[INITIALIZABLE_SLOT, LOCKED_EPOCH]]);
  });

  it('should emit events from the proxy address', () => {
    const proxy = env.deployProxy(impl.address, '0x');
    send(env, USER, proxy.address, counterV1Abi, 'setValue', [3n]);
    expect(env.events.latest).toEqual({ name: 'ValueChanged', args: { value: 3n }, emitter: proxy.address });
  });

  it('should see the original sender inside forwarded code', () => {
    const proxy = env.deployProxy(impl.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 0n]));
    send(env, OWNER, proxy.address, counterV1Abi, 'transferOwnership', [ADMIN]);
    expect(env.events.latest?.args).toEqual({ previousOwner: OWNER, newOwner: ADMIN });
  });

  it('should propagate implementation failures unchanged', () => {
    const proxy = env.deployProxy(impl.address, encodeCall(counterV1Abi, 'initialize', [OWNER, 0n]));
    expectRevert(() => send(env, ATTACKER, proxy.address, counterV1Abi, 'transferOwnership', [ATTACKER]), 'Unauthorized');
  });

  it('should reject calldata the implementation does not know', () => {
    const proxy = env.deployProxy(impl.address, '0x');
    expectRevert(() => send(env, USER, proxy.address, counterV2Abi, 'getTotal'), 'FunctionNotFound');
    expectRevert(() => env.call(USER, proxy.address, '0x'), 'FunctionNotFound');
  });

  it('should fail with InvalidImplementation when the target has no code', () => {
    expectRevert(() => send(env, USER, OWNER, counterV1Abi, 'getValue'), 'InvalidImplementation');
  });

  it('should refuse to deploy a proxy in front of an address without code', () => {
    expectRevert(() => env.deployProxy(USER, '0x'), 'InvalidImplementation');
  });

  it('should register nothing when the init call fails', () => {
    const locked = env.deploy(new CounterV1());
    const expected = new AddressAllocator();
    const [, lockedAddress, proxyAddress] = [0, 1, 2].map(() => expected.next(DEFAULT_DEPLOYER));
    expect(locked.address).toBe(lockedAddress);
    const before = env.events.length;

    const proxy = new ERC1967Proxy(locked.address, encodeCall(counterV1Abi, 'initialize', [ADDRESS_ZERO, 0n]));
    expectRevert(() => env.deploy(proxy), 'InvalidOwner');

    expect(env.events.length).toBe(before);
    expect(proxy.deployed).toBe(false);
    expect(proxy.address).toBe(ADDRESS_ZERO);
    expect(env.has(proxyAddress)).toBe(false);
    expectRevert(() => send(env, USER, proxyAddress, counterV1Abi, 'getValue'), 'InvalidImplementation');
  });

  it('should tag truncated arguments as invalid calldata', () => {
    const proxy = env.deployProxy(impl.address, '0x');
    const data = encodeCall(counterV1Abi, 'setValue', [42n]);
    const truncated: Hex = `0x${data.slice(2, 20)}`;

    expectRevert(() => env.call(USER, proxy.address, truncated), 'InvalidCalldata');
    expectRevert(() => env.call(USER, impl.address, truncated), 'InvalidCalldata');
  });

  it('should tag arguments of the wrong type as invalid calldata', () => {
    expectRevert(() => impl.dispatch('setValue', ['42']), 'InvalidCalldata');
    expectRevert(() => impl.dispatch('upgradeToAndCall', ['not-an-address', '0x']), 'InvalidCalldata');
    expectRevert(() => impl.dispatch('upgradeToAndCall', [USER, 'zz']), 'InvalidCalldata');
  });

  it('should stop a proxy that delegates to itself', () => {
    const shallow = new Environment({ maxCallDepth: 8 });
    const counter = shallow.deploy(new CounterV1());
    const proxy = shallow.deployProxy(counter.address, '0x', { admin: ADMIN });
    send(shallow, ADMIN, proxy.address, counterV1Abi, 'upgradeToAndCall', [proxy.address, '0x']);

    expectRevert(() => send(shallow, USER, proxy.address, counterV1Abi, 'getValue'), 'CallDepthExceeded');
  });
});

describe('call logging', () => {
  it('should bind the function name resolved through the proxy', () => {
    const lines: string[] = [];
    const log = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
    const env = new Environment({ logger: log });
    const counter = env.deploy(new CounterV1());
    const proxy = env.deployProxy(counter.address, '0x', { admin: ADMIN });

    send(env, USER, proxy.address, counterV1Abi, 'setValue', [4n]);
    send(env, USER, proxy.address, counterV1Abi, 'getValue');
    read(env, proxy.address, transparentProxyAbi, 'admin');
    expectRevert(() => env.call(USER, proxy.address, '0xdeadbeef'), 'FunctionNotFound');

    const calls = lines.map(line => JSON.parse(line)).filter(entry => entry.msg === 'call');
    expect(calls.map(entry => entry.functionName)).toEqual(['setValue', 'getValue', 'admin', '0xdeadbeef']);
    expect(calls[0]).toMatchObject({ component: 'environment', target: proxy.address, sender: USER });
  });
});

describe('counter arithmetic', () => {
  let env: Environment;

  beforeEach(() => {
    env = new Environment();
  });

  it('should revert an increment past the top of uint256', () => {
    const counter = env.deploy(new CounterV1());
    const proxy = env.deployProxy(counter.address, encodeCall(counterV1Abi, 'initialize', [OWNER, maxUint256]));

    expectRevert(() => send(env, USER, proxy.address, counterV1Abi, 'increment'), 'ArithmeticOverflow');
    expect(read(env, proxy.address, counterV1Abi, 'getValue')).toBe(maxUint256);
  });

  it('should revert a total past the top of uint256', () => {
    const counter = env.deploy(new CounterV2());
    const proxy = env.deployProxy(counter.address, encodeCall(counterV2Abi, 'initialize', [OWNER, maxUint256]));
    send(env, OWNER, proxy.address, counterV2Abi, 'initializeV2', [1n]);

    expectRevert(() => read(env, proxy.address, counterV2Abi, 'getTotal'), 'ArithmeticOverflow');
    expect(read(env, proxy.address, counterV2Abi, 'getNewVar')).toBe(1n);
  });
});

describe('DelegateExecutor', () => {
  it('should run code against the store it is handed', () => {
    const env = new Environment();
    const counter = env.deploy(new CounterV1());
    const executor = new DelegateExecutor(4);
    const store = new Storage();
    store.sstore(COUNTER_V1_LAYOUT.slotOf('value'), 11n);

    const result = executor.delegateCall(
      counter,
      store,
      { self: '0x5000000000000000000000000000000000000005', sender: USER, depth: 1 },
      encodeCall(counterV1Abi, 'getValue'),
    );

    expect(decodeResult(counterV1Abi, 'getValue', result)).toBe(11n);
  });

  it('should refuse frames deeper than its limit', () => {
    const env = new Environment();
    const counter = env.deploy(new CounterV1());
    const executor = new DelegateExecutor(4);
    expectRevert(
      () => executor.execute(counter, new Storage(), { self: counter.address, sender: USER, depth: 5 }, () => 0),
      'CallDepthExceeded',
    );
  });
});
