/**
 * TypeRegistry: Central registry for the types of a vocabulary.
 * 
 * This module handles:
 * - Indexing type declarations by name
 * - Building the inheritance graph (supertypes and direct subtypes)
 * - Detecting unknown supertypes and inheritance cycles
 * - Computing subtype closures for polymorphic dispatch
 */

import { SchemaError } from '../core/errors.js';
import type {
  TypeDef,
  TypeDependencyGraph,
  TypeDependencyNode,
  SupertypeResolutionResult,
} from './types.js';

/**
 * TypeRegistry - Manages indexing and inheritance resolution of type declarations.
 */
export class TypeRegistry {
  private readonly types = new Map<string, TypeDef>();
  private readonly dependencyGraph: TypeDependencyGraph = new Map();
  private readonly uriToName = new Map<string, string>();
  
  /**
   * Get a type by its name.
   */
  get(name: string): TypeDef | undefined {
    return this.types.get(name);
  }
  
  /**
   * Get a type by its IRI.
   */
  getByUri(uri: string): TypeDef | undefined {
    const name = this.uriToName.get(uri);
    return name !== undefined ? this.types.get(name) : undefined;
  }
  
  /**
   * Get all registered types, in registration order.
   */
  getAll(): TypeDef[] {
    return [...this.types.values()];
  }
  
  getAllNames(): string[] {
    return [...this.types.keys()];
  }
  
  has(name: string): boolean {
    return this.types.has(name);
  }
  
  get size(): number {
    return this.types.size;
  }
  
  /**
   * Add a type to the registry.
   * This will also update the inheritance graph.
   *
   * @throws SchemaError (DuplicateType) if the name is already registered
   */
  addType(type: TypeDef): void {
    const existing = this.types.get(type.name);
    if (existing !== undefined) {
      throw SchemaError.duplicateType(type.name, existing.source ?? '(inline)', type.source ?? '(inline)');
    }

    this.types.set(type.name, type);
    if (!this.uriToName.has(type.uri)) {
      this.uriToName.set(type.uri, type.name);
    }
    
    const node: TypeDependencyNode = {
      name: type.name,
      dependsOn: new Set(type.extends),
      dependedBy: new Set(),
    };
    
    this.dependencyGraph.set(type.name, node);
    
    // Update reverse edges of already registered supertypes
    for (const superName of node.dependsOn) {
      this.dependencyGraph.get(superName)?.dependedBy.add(type.name);
    }
    
    // Also pick up subtypes registered before this type
    for (const [otherName, otherNode] of this.dependencyGraph) {
      if (otherName !== type.name && otherNode.dependsOn.has(type.name)) {
        node.dependedBy.add(otherName);
      }
    }
  }
  
  addTypes(types: TypeDef[]): void {
    for (const type of types) {
      this.addType(type);
    }
  }
  
  /**
   * Direct supertypes of a type.
   */
  getSupertypes(name: string): string[] {
    const node = this.dependencyGraph.get(name);
    return node !== undefined ? [...node.dependsOn] : [];
  }
  
  /**
   * Direct subtypes of a type, in registration order.
   */
  getDirectSubtypes(name: string): string[] {
    const node = this.dependencyGraph.get(name);
    return node !== undefined ? [...node.dependedBy] : [];
  }
  
  /**
   * A type followed by every type that transitively extends it,
   * breadth-first, each subtype listed once.
   */
  subtypes(name: string): string[] {
    if (!this.types.has(name)) {
      return [];
    }
    const order = [name];
    const seen = new Set(order);
    for (let i = 0; i < order.length; i++) {
      const current = order[i];
      if (current === undefined) {
        break;
      }
      for (const sub of this.getDirectSubtypes(current)) {
        if (!seen.has(sub)) {
          seen.add(sub);
          order.push(sub);
        }
      }
    }
    return order;
  }
  
  /**
   * Whether `name` is `base` or transitively extends it.
   */
  isSubtypeOf(name: string, base: string): boolean {
    return this.subtypes(base).includes(name);
  }
  
  /**
   * Check supertype resolution status.
   * Returns information about unknown supertypes and cycles.
   */
  checkResolution(): SupertypeResolutionResult {
    const unresolved: SupertypeResolutionResult['unresolved'] = [];
    const cycles: string[][] = [];
    
    for (const [name, node] of this.dependencyGraph) {
      for (const superName of node.dependsOn) {
        if (!this.types.has(superName)) {
          unresolved.push({ type: name, supertype: superName });
        }
      }
    }
    
    // Detect cycles using DFS
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const path: string[] = [];
    
    const detectCycle = (name: string): boolean => {
      visited.add(name);
      recursionStack.add(name);
      path.push(name);
      
      const node = this.dependencyGraph.get(name);
      if (node !== undefined) {
        for (const superName of node.dependsOn) {
          if (!visited.has(superName)) {
            if (this.types.has(superName) && detectCycle(superName)) {
              return true;
            }
          } else if (recursionStack.has(superName)) {
            const cycleStart = path.indexOf(superName);
            const cycle = path.slice(cycleStart);
            cycle.push(superName); // Close the cycle
            cycles.push(cycle);
            return true;
          }
        }
      }
      
      path.pop();
      recursionStack.delete(name);
      return false;
    };
    
    for (const name of this.types.keys()) {
      if (!visited.has(name)) {
        path.length = 0;
        recursionStack.clear();
        detectCycle(name);
      }
    }
    
    return {
      resolved: unresolved.length === 0 && cycles.length === 0,
      unresolved,
      cycles,
    };
  }
  
  /**
   * Throw the first resolution problem, if any.
   *
   * @throws SchemaError (UnknownSupertype or CyclicInheritance)
   */
  assertResolved(): void {
    const { unresolved, cycles } = this.checkResolution();
    const [missing] = unresolved;
    if (missing !== undefined) {
      throw SchemaError.unknownSupertype(missing.type, missing.supertype);
    }
    const [cycle] = cycles;
    if (cycle !== undefined) {
      throw SchemaError.cyclicInheritance(cycle);
    }
  }
  
  /**
   * Get types in topological order (supertypes first).
   *
   * @throws SchemaError (CyclicInheritance) if there are cycles
   */
  getTopologicalOrder(): string[] {
    const result: string[] = [];
    const visited = new Set<string>();
    const temp: string[] = [];
    
    const visit = (name: string): void => {
      const onPath = temp.indexOf(name);
      if (onPath >= 0) {
        throw SchemaError.cyclicInheritance([...temp.slice(onPath), name]);
      }
      if (visited.has(name)) {
        return;
      }
      
      temp.push(name);
      
      for (const superName of this.getSupertypes(name)) {
        // Only visit if the supertype is in our registry
        if (this.types.has(superName)) {
          visit(superName);
        }
      }
      
      temp.pop();
      visited.add(name);
      result.push(name);
    };
    
    for (const name of this.types.keys()) {
      visit(name);
    }
    
    return result;
  }
  
  clear(): void {
    this.types.clear();
    this.dependencyGraph.clear();
    this.uriToName.clear();
  }
}

/**
 * Create a new TypeRegistry instance.
 */
export function createTypeRegistry(types: TypeDef[] = []): TypeRegistry {
  const registry = new TypeRegistry();
  registry.addTypes(types);
  return registry;
}
