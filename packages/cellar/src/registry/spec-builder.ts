/*
 * Spec builder
 * ------------
 * Turns the options passed to Registry.register() into a frozen ResourceSpec,
 * or fails with an InvalidSpecError naming the resource and the field.
 *
 * Name-level checks (identifier, duplicates, reserved names) belong to the
 * registry; everything about the option bag itself happens here.
 */
import {
  classInitializer,
  isArgumentRef,
  isLiteralRef,
  referencedResource,
} from '../api/class-init.js';
import { isIdentifier } from '../core/cache-key.js';
import { FLAG_DERIVED, FLAG_LITERAL, FLAG_OPTIONS, toFlags } from '../core/flags.js';
import { InvalidSpecError } from '../errors/errors.js';
import type {
  ArgumentPredicate,
  DependencyRef,
  Initializer,
  ResourceMap,
  ResourceOptions,
  ResourceSpec,
} from '../types/types.js';

const KNOWN_OPTIONS = new Set<string>([
  'init',
  'literal',
  'class',
  'argument',
  'dependencies',
  'require',
  'cleanup',
  'forkCleanup',
  'forkSafe',
  'cleanupOrder',
  'ignoreCache',
  'derived',
  'preload',
  'postInit',
]);

const EMPTY: readonly string[] = Object.freeze([]);

const isEmpty: ArgumentPredicate = (argument) => argument === '';

function isDependencyRef(ref: unknown): ref is DependencyRef {
  return ref === true || isIdentifier(ref) || isLiteralRef(ref) || isArgumentRef(ref);
}

/**
 * Compile the `argument` option into a predicate.
 * A RegExp is anchored so that it must match the whole argument.
 */
function toPredicate(
  name: string,
  argument: RegExp | ArgumentPredicate | undefined
): ArgumentPredicate {
  if (argument === undefined) return isEmpty;
  if (argument instanceof RegExp) {
    const anchored = new RegExp(`^(?:${argument.source})$`, argument.flags.replace(/[gmy]/g, ''));
    return (value) => anchored.test(value);
  }
  if (typeof argument === 'function') {
    return (value) => argument(value) === true;
  }
  throw new InvalidSpecError(name, 'argument', 'must be a RegExp or a function');
}

function toModules(name: string, required: unknown): readonly string[] {
  if (required === undefined) return EMPTY;
  const list = typeof required === 'string' ? [required] : required;
  if (!Array.isArray(list) || list.some((m) => typeof m !== 'string' || m === '')) {
    throw new InvalidSpecError(name, 'require', 'must be a module name or an array of module names');
  }
  return Object.freeze([...list]);
}

function toDependencyList(name: string, deps: unknown): readonly string[] {
  if (deps === undefined) return EMPTY;
  if (!Array.isArray(deps)) {
    throw new InvalidSpecError(name, 'dependencies', 'must be an array');
  }
  const bad = deps.filter((d) => !isIdentifier(d));
  if (bad.length > 0) {
    throw new InvalidSpecError(
      name,
      'dependencies',
      `contains illegal dependency name(s): ${bad.map((d) => `'${String(d)}'`).join(', ')}`
    );
  }
  return Object.freeze([...deps]);
}

function toDependencyMap(name: string, deps: unknown): Readonly<Record<string, DependencyRef>> {
  if (typeof deps !== 'object' || deps === null || Array.isArray(deps)) {
    throw new InvalidSpecError(
      name,
      'dependencies',
      "must be a map of constructor parameters when 'class' is used"
    );
  }
  const refs: Record<string, DependencyRef> = {};
  for (const [param, ref] of Object.entries(deps)) {
    if (!isDependencyRef(ref)) {
      throw new InvalidSpecError(
        name,
        'dependencies',
        `has an invalid reference for parameter '${param}'`
      );
    }
    refs[param] = ref;
  }
  return refs;
}

function assertCallable(name: string, field: string, value: unknown): void {
  if (value !== undefined && typeof value !== 'function') {
    throw new InvalidSpecError(name, field, 'must be a function');
  }
}

/**
 * Validate `options` and build the frozen definition of resource `name`.
 *
 * @param name - Resource name, already checked by the registry
 * @param input - Options object, or a bare initializer
 * @param order - Registration index
 * @throws InvalidSpecError on any malformed option
 */
export function buildSpec<T, R extends ResourceMap>(
  name: string,
  input: ResourceOptions<T, R> | Initializer<T, R>,
  order: number
): ResourceSpec<R> {
  if (typeof input !== 'function' && (typeof input !== 'object' || input === null)) {
    throw new InvalidSpecError(name, 'options', 'must be an object or an initializer function');
  }
  const options: ResourceOptions<T, R> = typeof input === 'function' ? { init: input } : input;

  const extra = Object.keys(options).filter((key) => !KNOWN_OPTIONS.has(key));
  if (extra.length > 0) {
    throw new InvalidSpecError(name, extra.join(', '), 'is not a known option');
  }

  for (const flag of FLAG_OPTIONS) {
    const value = options[flag];
    if (value !== undefined && typeof value !== 'boolean') {
      throw new InvalidSpecError(name, flag, 'must be a boolean');
    }
  }

  const hasLiteral = 'literal' in options;
  const sources = [options.init !== undefined, hasLiteral, options.class !== undefined];
  if (sources.filter(Boolean).length > 1) {
    throw new InvalidSpecError(name, 'init', "'init', 'literal' and 'class' are mutually exclusive");
  }

  let init: Initializer<unknown, R>;
  let dependencies: readonly string[];
  let flags = toFlags(options);

  if (hasLiteral) {
    const { literal } = options;
    if (options.dependencies !== undefined) {
      throw new InvalidSpecError(name, 'dependencies', "is not allowed with 'literal'");
    }
    init = () => literal;
    dependencies = EMPTY;
    flags |= FLAG_LITERAL | FLAG_DERIVED;
  } else if (options.class !== undefined) {
    if (typeof options.class !== 'function') {
      throw new InvalidSpecError(name, 'class', 'must be a constructor');
    }
    if (options.argument !== undefined) {
      throw new InvalidSpecError(name, 'argument', "is not allowed with 'class'");
    }
    const refs = toDependencyMap(name, options.dependencies ?? {});
    init = classInitializer<T, R>(options.class, refs);
    dependencies = Object.freeze(
      Object.entries(refs)
        .map(([param, ref]) => referencedResource(param, ref))
        .filter((dep): dep is string => dep !== undefined)
    );
  } else {
    if (typeof options.init !== 'function') {
      throw new InvalidSpecError(name, 'init', 'must be a function');
    }
    init = options.init;
    dependencies = toDependencyList(name, options.dependencies);
  }

  const validate = toPredicate(name, options.argument);

  const cleanupOrder = options.cleanupOrder ?? 0;
  if (typeof cleanupOrder !== 'number' || Number.isNaN(cleanupOrder)) {
    throw new InvalidSpecError(name, 'cleanupOrder', 'must be a number');
  }

  assertCallable(name, 'cleanup', options.cleanup);
  assertCallable(name, 'forkCleanup', options.forkCleanup);
  assertCallable(name, 'postInit', options.postInit);

  if (options.ignoreCache) {
    const useless =
      options.cleanup !== undefined
        ? 'cleanup'
        : options.forkCleanup !== undefined
          ? 'forkCleanup'
          : cleanupOrder !== 0
            ? 'cleanupOrder'
            : undefined;
    if (useless) {
      throw new InvalidSpecError(name, useless, "is useless while 'ignoreCache' is in use");
    }
  }

  const modules = toModules(name, options.require);

  const spec: ResourceSpec<R> = {
    name,
    order,
    flags,
    cleanupOrder,
    dependencies,
    modules,
    init,
    validate,
    cleanup: options.cleanup,
    forkCleanup: options.forkCleanup,
    postInit: options.postInit,
  };
  return Object.freeze(spec);
}
