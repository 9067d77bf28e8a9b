export { Logger } from './Logger';
export type { RunLog, LogLevel, LogSubscriber, LogFilter } from './Logger';
export {
  RunError,
  PlanFileNotFoundError,
  PlanValidationError,
  UnknownRoleError,
  UciCommandError,
  WanVlanConflictError,
  ExportWriteError,
} from './errors';
export {
  IPAddress,
  SubnetMask,
  TOKEN_TAG_SUFFIX,
  CHIP_TAG_SUFFIX,
  LOGICAL_PORT_PREFIX,
  VLAN_MIN,
  VLAN_MAX,
  DEFAULT_LAN_VLAN,
  WAN_VLAN,
} from './types';
export type { PortId, PortToken, ResolvedPort } from './types';
