/** Raised while assembling the registry at startup; never during a turn. */
export class ToolRegistrationError extends Error {
  override name: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class DuplicateToolNameError extends ToolRegistrationError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool already registered: ${toolName}`);
    this.toolName = toolName;
  }
}

export class InvalidToolSchemaError extends ToolRegistrationError {
  readonly toolName: string;

  constructor(toolName: string, reason: string) {
    super(`invalid schema for tool '${toolName}': ${reason}`);
    this.toolName = toolName;
  }
}
