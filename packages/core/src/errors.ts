export class CircularDependencyError extends Error {
  override readonly name = "CircularDependencyError";

  constructor(readonly atomName: string) {
    super(
      `Circular dependency detected while evaluating "${atomName}". A computed atom is watching itself, directly or through other computed atoms.`
    );
  }
}

/**
 * Thrown when a node is read before it has ever produced a value, e.g. an
 * eager computed atom whose initial evaluation threw.
 */
export class UninitializedAccessError extends Error {
  override readonly name = "UninitializedAccessError";

  constructor(readonly atomName: string) {
    super(`"${atomName}" was read before its value was ever computed.`);
  }
}

export class ContainerDisposedError extends Error {
  override readonly name = "ContainerDisposedError";

  constructor() {
    super("You cannot use a container after it has been disposed.");
  }
}
