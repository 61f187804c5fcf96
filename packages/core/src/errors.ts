export type ErrorCode = 'INTEGRITY' | 'OPTIONS' | 'INVENTORY';

export class VulnrankError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * An edge, vulnerability or root refers to a component the inventory does not declare,
 * or the component list itself is inconsistent. The run is aborted before anything is scored.
 */
export class IntegrityError extends VulnrankError {
  readonly componentId: string;
  readonly referencedBy: string;

  constructor(componentId: string, referencedBy: string, detail?: string) {
    super('INTEGRITY', detail ?? `Unknown component "${componentId}" referenced by ${referencedBy}`);
    this.componentId = componentId;
    this.referencedBy = referencedBy;
  }
}

export class InvalidOptionsError extends VulnrankError {
  readonly option: string;

  constructor(option: string, message: string) {
    super('OPTIONS', `Invalid option ${option}: ${message}`);
    this.option = option;
  }
}

export class InventoryFormatError extends VulnrankError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super('INVENTORY', `Invalid inventory ${filePath}: ${message}`);
    this.filePath = filePath;
  }
}
