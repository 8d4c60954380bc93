const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeArgument = (argument: string): string =>
  argument === '' ? '(no argument)' : `'${argument}'`;

/**
 * Malformed resource declaration.
 */
export class InvalidSpecError extends Error {
  constructor(
    public resource: string,
    public field: string,
    public reason: string
  ) {
    const dev = [
      `Invalid declaration of resource '${resource}'`,
      '',
      `  Field '${field}': ${reason}`,
    ];
    super(format(`Resource '${resource}': '${field}' ${reason}.`, dev));
    this.name = 'InvalidSpecError';
  }
}

export class DuplicateResourceError extends Error {
  constructor(public resource: string) {
    const dev = [
      `Attempt to redefine resource '${resource}'`,
      '',
      'A resource declaration cannot be replaced once registered.',
      '',
      'To fix this:',
      `  1. Rename one of the two '${resource}' declarations`,
      `  2. Use control().override() in tests instead of re-registering`,
    ];
    super(format(`Attempt to redefine resource '${resource}'.`, dev));
    this.name = 'DuplicateResourceError';
  }
}

export class ReservedNameError extends Error {
  constructor(public resource: string) {
    const dev = [
      `Resource name '${resource}' is reserved`,
      '',
      `'${resource}' collides with a container operation and cannot name a resource.`,
    ];
    super(format(`Resource name '${resource}' is reserved.`, dev));
    this.name = 'ReservedNameError';
  }
}

export class MissingDependencyError extends Error {
  constructor(
    public resource: string,
    public dependency: string
  ) {
    const dev = [
      `Resource '${resource}' depends on unknown resource '${dependency}'`,
      '',
      'To fix this:',
      `  1. Register '${dependency}' in the same registry`,
      `  2. Or remove it from the 'dependencies' of '${resource}'`,
    ];
    super(format(`Resource '${resource}' depends on unknown resource '${dependency}'.`, dev));
    this.name = 'MissingDependencyError';
  }
}

export class UnloadableDependencyError extends Error {
  constructor(
    public resource: string,
    public module: string,
    cause: unknown
  ) {
    const dev = [
      `Resource '${resource}' requires module '${module}', which cannot be loaded`,
      '',
      "See 'cause' for the resolution failure.",
    ];
    super(format(`Resource '${resource}' requires unloadable module '${module}'.`, dev), {
      cause,
    });
    this.name = 'UnloadableDependencyError';
  }
}

/**
 * Access to a resource name the registry does not know.
 */
export class UnknownResourceError extends Error {
  constructor(
    public resource: string,
    public availableResources: string[] = []
  ) {
    const parts: string[] = [`Unknown resource '${resource}'.`, ''];

    if (availableResources.length > 0 && availableResources.length <= 10) {
      parts.push('Available resources:');
      availableResources.forEach((r) => parts.push(`  - ${r}`));
    } else if (availableResources.length > 10) {
      parts.push(`${availableResources.length} resources are registered.`);
    }

    super(format(`Unknown resource '${resource}'.`, parts));
    this.name = 'UnknownResourceError';
  }
}

export class ArgumentTypeError extends Error {
  constructor(
    public resource: string,
    public received: string
  ) {
    const dev = [
      `Argument for resource '${resource}' must be a scalar`,
      '',
      `Received a value of type '${received}'.`,
      'Arguments are strings; numbers, bigints and booleans are converted.',
    ];
    super(format(`Argument for resource '${resource}' must be a scalar.`, dev));
    this.name = 'ArgumentTypeError';
  }
}

export class ArgumentValidationError extends Error {
  constructor(
    public resource: string,
    public argument: string
  ) {
    const dev = [
      `Argument check failed for resource '${resource}': ${describeArgument(argument)}`,
      '',
      `The 'argument' validator of '${resource}' rejected this value.`,
    ];
    super(
      format(`Argument check failed for resource '${resource}': ${describeArgument(argument)}.`, dev)
    );
    this.name = 'ArgumentValidationError';
  }
}

/**
 * A resolution chain re-entered a key that is still being initialized.
 *
 * `key` is the cache key of the re-entered instance (`resource` or
 * `resource@argument`); `pending` holds every key in flight at detection
 * time, sorted.
 */
export class CircularDependencyError extends Error {
  public key: string;

  constructor(
    public resource: string,
    public argument: string,
    public pending: string[]
  ) {
    const key = argument === '' ? resource : `${resource}@${argument}`;
    const loop = pending.join(', ');
    const dev = [
      `Circular dependency detected for resource ${key}: {${loop}}`,
      '',
      `Resource ${key} was requested again while its own initializer was running.`,
      '',
      'Solutions:',
      '  1. Extract the shared part into a separate resource',
      '  2. Seed one side with control().setCache() before the first access',
    ];
    super(format(`Circular dependency detected for resource ${key}: {${loop}}`, dev));
    this.key = key;
    this.name = 'CircularDependencyError';
  }
}

export class LockedModeError extends Error {
  constructor(public resource: string) {
    const dev = [
      `Attempting to initialize resource '${resource}' in locked mode`,
      '',
      'The container is locked: only cached, overridden or derived resources are available.',
      '',
      'To fix this:',
      `  1. control().override({ ${resource}: ... }) before locking`,
      `  2. Or mark '${resource}' as derived if it has no side effects of its own`,
    ];
    super(format(`Attempting to initialize resource '${resource}' in locked mode.`, dev));
    this.name = 'LockedModeError';
  }
}

export class TeardownInProgressError extends Error {
  constructor(
    public resource: string,
    public containerName: string
  ) {
    const dev = [
      `Container '${containerName}' is being torn down`,
      '',
      `Resource '${resource}' cannot be initialized after cleanup() has begun.`,
    ];
    super(
      format(`Cannot initialize '${resource}': container '${containerName}' is torn down.`, dev)
    );
    this.name = 'TeardownInProgressError';
  }
}

export class InvalidCacheValueError extends Error {
  constructor(
    public resource: string,
    public received: string
  ) {
    const dev = [
      `Invalid setCache value for resource '${resource}'`,
      '',
      'Valid shapes:',
      '  - null or undefined: clear every cached instance',
      '  - [value]: the no-argument slot',
      '  - [arg, value, arg, value, ...]: argument/value pairs',
      '  - { arg: value, ... } or a Map: argument/value pairs',
      '',
      'Received:',
      `  ${received}`,
    ];
    super(format(`Invalid setCache value for resource '${resource}'.`, dev));
    this.name = 'InvalidCacheValueError';
  }
}

export class InvalidContainerConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'InvalidContainerConfigError';
  }
}

/**
 * Error thrown when one or more cleanup functions fail during teardown.
 *
 * Teardown always runs to completion first; every individual failure is kept
 * in `errors`.
 */
export class AggregateCleanupError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple cleanup errors occurred',
      '',
      `${errors.length} error(s) occurred during container cleanup:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} cleanup error(s) occurred.`, dev));
    this.name = 'AggregateCleanupError';
  }
}
