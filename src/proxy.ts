import { TypeMismatchError } from "./errors.js";
import { MappingNode, type NodeValue, SequenceNode, type TrackedNode } from "./node.js";
import { TRACKED_NODE, type Mapping, type Sequence, type Value } from "./types.js";
import { markTracked } from "./value.js";

// Array methods that write to the array. push and pop map onto node
// operations; the rest run on a copy that then replaces the sequence.
const SEQUENCE_MUTATORS = new Set([
  "push",
  "pop",
  "shift",
  "unshift",
  "splice",
  "sort",
  "reverse",
  "fill",
  "copyWithin",
]);

// Node.js inspection symbol
const NODE_INSPECT = Symbol.for("nodejs.util.inspect.custom");

// Well-known symbols that should pass through directly to target
const PASSTHROUGH_SYMBOLS = new Set<symbol>([
  Symbol.toStringTag,
  Symbol.toPrimitive,
  Symbol.isConcatSpreadable,
  Symbol.species,
  Symbol.unscopables,
  NODE_INSPECT,
]);

const INDEX_PATTERN = /^(0|[1-9]\d*)$/;

// Node -> proxy, so repeated reads hand back the same object
const proxyCache = new WeakMap<TrackedNode, Mapping | Sequence>();
const nodeByProxy = new WeakMap<object, TrackedNode>();

/**
 * Scalars pass through; nodes become proxies.
 */
export function toProxyValue(value: NodeValue): Value {
  if (value instanceof MappingNode || value instanceof SequenceNode) {
    return createTrackedProxy(value);
  }
  return value;
}

export function createTrackedProxy(node: MappingNode): Mapping;
export function createTrackedProxy(node: SequenceNode): Sequence;
export function createTrackedProxy(node: TrackedNode): Mapping | Sequence;
export function createTrackedProxy(node: TrackedNode): Mapping | Sequence {
  const cached = proxyCache.get(node);
  if (cached) return cached;

  const proxy = node instanceof MappingNode ? mappingProxy(node) : sequenceProxy(node);
  proxyCache.set(node, proxy);
  nodeByProxy.set(proxy, node);
  markTracked(proxy, node.raw());
  return proxy;
}

function mappingProxy(node: MappingNode): Mapping {
  return new Proxy(node.raw(), {
    get(obj, prop, receiver) {
      if (prop === TRACKED_NODE) return node;
      if (typeof prop === "symbol") {
        return PASSTHROUGH_SYMBOLS.has(prop) ? Reflect.get(obj, prop, obj) : undefined;
      }
      if (node.has(prop)) return toProxyValue(node.get(prop));
      if (prop === "toJSON") return () => node.raw();
      return Reflect.get(obj, prop, receiver);
    },

    set(_obj, prop, value) {
      if (typeof prop === "symbol") return false;
      node.set(prop, value);
      return true;
    },

    deleteProperty(_obj, prop) {
      if (typeof prop === "symbol") return false;
      node.pop(prop, undefined);
      return true;
    },

    defineProperty() {
      return false;
    },

    setPrototypeOf() {
      return false;
    },
  });
}

function sequenceProxy(node: SequenceNode): Sequence {
  const target = node.raw();
  const proxy: Sequence = new Proxy(target, {
    get(obj, prop, receiver) {
      if (prop === TRACKED_NODE) return node;
      if (prop === Symbol.iterator) {
        return function* () {
          for (const item of node) yield toProxyValue(item);
        };
      }
      if (typeof prop === "symbol") {
        return PASSTHROUGH_SYMBOLS.has(prop) ? Reflect.get(obj, prop, obj) : undefined;
      }
      if (INDEX_PATTERN.test(prop)) {
        const item = node.find(Number(prop));
        return item === undefined ? undefined : toProxyValue(item);
      }
      if (prop === "length") return node.length;
      if (prop === "toJSON") return () => node.raw();
      if (SEQUENCE_MUTATORS.has(prop)) return mutator(node, prop, proxy);
      return Reflect.get(obj, prop, receiver);
    },

    set(_obj, prop, value) {
      if (typeof prop === "symbol") return false;
      if (prop === "length") {
        const length = Number(value);
        if (!Number.isInteger(length) || length < 0 || length > node.length) {
          throw new TypeMismatchError(node.path, `Cannot grow sequence at ${node.path.toDotted()} by setting length`);
        }
        if (length < node.length) node.reset(node.raw().slice(0, length));
        return true;
      }
      if (!INDEX_PATTERN.test(prop)) {
        throw new TypeMismatchError(node.path.child(prop), `Sequence at ${node.path.toDotted()} only takes index keys`);
      }
      const index = Number(prop);
      if (index === node.length) {
        node.push(value);
      } else {
        node.set(index, value);
      }
      return true;
    },

    deleteProperty(_obj, prop) {
      throw new TypeMismatchError(
        node.path.child(String(prop)),
        `Cannot delete from sequence at ${node.path.toDotted()}; use splice() or pop()`,
      );
    },

    defineProperty() {
      return false;
    },

    setPrototypeOf() {
      return false;
    },
  });
  return proxy;
}

function mutator(node: SequenceNode, name: string, proxy: Sequence): (...args: unknown[]) => unknown {
  if (name === "push") {
    return (...items: unknown[]) => {
      for (const item of items) node.push(item);
      return node.length;
    };
  }
  if (name === "pop") {
    return () => (node.length === 0 ? undefined : node.pop());
  }
  return (...args: unknown[]) => {
    const method: unknown = Reflect.get(Array.prototype, name);
    if (typeof method !== "function") return undefined;
    const copy = [...node.raw()];
    const result: unknown = Reflect.apply(method, copy, args);
    node.reset(copy);
    // sort, reverse, fill and copyWithin return the array itself
    return result === copy ? proxy : result;
  };
}

export function getProxyNode(proxy: object): TrackedNode | undefined {
  return nodeByProxy.get(proxy);
}

export function isTrackedProxy(value: unknown): boolean {
  return value !== null && typeof value === "object" && nodeByProxy.has(value);
}
