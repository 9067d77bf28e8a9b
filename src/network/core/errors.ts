/**
 * Errors - Fatal conditions that abort a run
 *
 * Detection problems and unresolvable port tokens are never errors: they are
 * logged and the run continues. Only a broken plan, a plan the detected
 * hardware cannot carry, or a failing live `uci` command end it.
 */

export class RunError extends Error {
  kind: string;

  constructor(kind: string, message: string) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }

  toString(): string {
    return `${this.kind}: ${this.message}`;
  }
}

export class PlanFileNotFoundError extends RunError {
  readonly path: string;

  constructor(path: string) {
    super('PlanFileNotFoundError', `plan file not found: ${path}`);
    this.path = path;
  }
}

export class PlanValidationError extends RunError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('PlanValidationError', `invalid network plan:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

export class UnknownRoleError extends RunError {
  readonly role: string;
  readonly available: string[];

  constructor(role: string, available: string[]) {
    super('UnknownRoleError', `unknown network role '${role}', available roles: [${available.join(', ')}]`);
    this.role = role;
    this.available = available;
  }
}

export class WanVlanConflictError extends RunError {
  readonly network: string;
  readonly vlanId: number;

  constructor(network: string, vlanId: number) {
    super('WanVlanConflictError',
      `network '${network}' uses VLAN ${vlanId}, which carries WAN on this switch chip`);
    this.network = network;
    this.vlanId = vlanId;
  }
}

export class UciCommandError extends RunError {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim() || 'no output';
    super('UciCommandError', `command failed (exit ${exitCode ?? 'signal'}): ${command}: ${detail}`);
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class ExportWriteError extends RunError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('ExportWriteError', `cannot write deployment script ${path}: ${reason}`);
    this.path = path;
  }
}
