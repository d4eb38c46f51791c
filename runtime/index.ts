/**
 * Upgradeable Proxy Runtime
 *
 * In-process model of upgradeable proxies: slot-keyed contract storage,
 * delegated execution, reserved control slots, the initialization guard and
 * the upgrade authorities built on them.
 */

// =============================================================================
// CORE
// =============================================================================

export {
  ADDRESS_ZERO,
  AddressAllocator,
  Contract,
  EventStream,
  Storage,
  argAddress,
  argBytes,
  argUint,
  checkedAdd,
  decodeCall,
  isZeroAddress,
  normalizeAddress,
  type DecodedCall,
  type EmittedEvent,
  type ExecutionContext,
  type Host,
  type MethodHandler,
  type MethodTable,
  type StorageSnapshot,
} from './base';
export { ContractError, isContractError, revert, type RevertReason } from './errors';

// =============================================================================
// SLOTS AND LAYOUT
// =============================================================================

export {
  ADMIN_SLOT,
  ERC1967_SLOTS,
  IMPLEMENTATION_SLOT,
  INITIALIZABLE_SLOT,
  NAIVE_SLOTS,
  OWNER_SLOT,
  SEQUENTIAL_SLOT_LIMIT,
  controlSlots,
  isReservedRegion,
  reservedSlot,
  sequentialSlot,
  slotToHex,
  type ProxySlots,
} from './slots';
export {
  StorageLayout,
  assertDisjoint,
  assertUpgradeCompatible,
  assertUpgradePath,
  decodeAddress,
  decodeBool,
  defineLayout,
  encodeAddress,
  encodeBool,
  type AllocatedField,
  type FieldDescriptor,
  type ValueType,
} from './layout';

// =============================================================================
// EXECUTION
// =============================================================================

export { DelegateExecutor, type CallFrame } from './dispatcher';
export { EMPTY_CALLDATA, decodeResult, encodeCall, functionNameOf } from './calls';
export {
  DEFAULT_DEPLOYER,
  Environment,
  type DeployOptions,
  type DeployProxyOptions,
  type EnvironmentOptions,
  type ProxyRecord,
} from './environment';

// =============================================================================
// LIFECYCLE AND UPGRADES
// =============================================================================

export {
  Initializable,
  LOCKED_EPOCH,
  decodeInitializationState,
  initializableAbi,
  type InitializationState,
} from './Initializable';
export { OwnableUpgradeable, ownableAbi } from './OwnableUpgradeable';
export { readImplementation, requireCode, upgradeAbi, upgradeImplementation } from './ERC1967Upgrade';
export { ERC1967Proxy, Proxy, type ProxyOptions } from './Proxy';
export {
  AdminPolicy,
  TransparentProxy,
  transparentProxyAbi,
  type TransparentProxyOptions,
  type UpgradePolicy,
} from './TransparentProxy';
export { UUPSUpgradeable, uupsAbi } from './UUPSUpgradeable';

// =============================================================================
// AMBIENT
// =============================================================================

export { clearConfigCache, loadConfig, type LogLevel, type RuntimeConfig } from './config';
export { logger } from './logger';
