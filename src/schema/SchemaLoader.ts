/**
 * SchemaLoader: Loads vocabulary schema documents from the file system.
 * 
 * This module handles:
 * - Reading YAML and JSON schema documents
 * - Validating their structure
 * - Collecting type declarations from a directory tree
 * 
 * It does NOT handle:
 * - Supertype resolution (that's TypeRegistry's job)
 * - Property inheritance (that's InheritanceResolver's job)
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative, extname, basename } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { SchemaError } from '../core/errors.js';
import { readSchemaDocument } from './SchemaDocument.js';
import type {
  TypeDef,
  SchemaLoadResult,
  SchemaLoadAllResult,
  SchemaLoadOptions,
  SchemaLoadError,
} from './types.js';

/**
 * Default file patterns for schema documents.
 */
const DEFAULT_PATTERNS = ['*.vocab.yaml', '*.vocab.yml', '*.vocab.json'];

/**
 * Check if a filename matches any of the patterns.
 */
function matchesPattern(filename: string, patterns: string[]): boolean {
  return patterns.some(pattern => {
    // Simple glob matching: *.vocab.yaml -> ends with .vocab.yaml
    if (pattern.startsWith('*')) {
      const suffix = pattern.slice(1);
      return filename.endsWith(suffix);
    }
    return filename === pattern;
  });
}

/**
 * Parse schema document content (YAML or JSON).
 */
function parseSchemaContent(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase();
  
  if (ext === '.json') {
    return JSON.parse(content);
  }
  
  // Default to YAML for .yaml, .yml, or any other extension
  return parseYaml(content);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse and validate schema document text.
 *
 * @param content - Document text
 * @param path - Name of the document; its extension selects the parser
 * @throws SchemaError (InvalidDocument) on syntax or structure errors
 */
export function parseSchemaDocument(content: string, path: string): TypeDef[] {
  let parsed: unknown;
  try {
    parsed = parseSchemaContent(content, path);
  } catch (err) {
    throw new SchemaError('InvalidDocument', `Failed to parse schema document ${path}: ${describeError(err)}`);
  }
  return readSchemaDocument(parsed, path);
}

/**
 * Load a single schema document.
 * 
 * @param filePath - Absolute path to the document
 * @param basePath - Base directory for computing relative paths
 * @returns SchemaLoadResult with the declared types or error
 */
export async function loadSchemaFile(
  filePath: string,
  basePath: string
): Promise<SchemaLoadResult> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const relativePath = relative(basePath, filePath) || basename(filePath);
    const types = parseSchemaDocument(content, relativePath);
    return { success: true, types };
  } catch (err) {
    return {
      success: false,
      error: `Failed to load schema ${filePath}: ${describeError(err)}`,
      code: err instanceof SchemaError ? err.code : undefined,
    };
  }
}

/**
 * Recursively find all schema documents in a directory.
 * 
 * @param dirPath - Directory to search
 * @param patterns - File patterns to match
 * @param recursive - Whether to search recursively
 * @returns Array of absolute file paths, sorted within each directory
 */
async function findSchemaFiles(
  dirPath: string,
  patterns: string[],
  recursive: boolean
): Promise<string[]> {
  const files: string[] = [];
  
  const entries = await readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    
    if (entry.isDirectory()) {
      if (recursive) {
        const subFiles = await findSchemaFiles(fullPath, patterns, recursive);
        files.push(...subFiles);
      }
    } else if (entry.isFile() && matchesPattern(entry.name, patterns)) {
      files.push(fullPath);
    }
  }
  
  return files;
}

/**
 * Reject a type declared by two documents.
 */
function addTypes(
  collected: Map<string, TypeDef>,
  types: TypeDef[],
  errors: SchemaLoadError[],
  path: string,
): void {
  for (const type of types) {
    const existing = collected.get(type.name);
    if (existing !== undefined) {
      const err = SchemaError.duplicateType(type.name, existing.source ?? '(unknown)', path);
      errors.push({ path, error: err.message, code: err.code });
      continue;
    }
    collected.set(type.name, type);
  }
}

/**
 * Load all schema documents from a directory.
 * 
 * @param options - Loading options
 * @returns SchemaLoadAllResult with the declared types and any errors
 */
export async function loadAllSchemas(
  options: SchemaLoadOptions
): Promise<SchemaLoadAllResult> {
  const patterns = options.patterns ?? DEFAULT_PATTERNS;
  const recursive = options.recursive ?? true;
  
  // Verify base path exists and is a directory
  try {
    const stats = await stat(options.basePath);
    if (!stats.isDirectory()) {
      return {
        types: [],
        errors: [{ path: options.basePath, error: 'Not a directory' }],
      };
    }
  } catch {
    return {
      types: [],
      errors: [{ path: options.basePath, error: 'Directory does not exist' }],
    };
  }
  
  const filePaths = await findSchemaFiles(options.basePath, patterns, recursive);
  
  const collected = new Map<string, TypeDef>();
  const errors: SchemaLoadError[] = [];
  
  for (const filePath of filePaths) {
    const result = await loadSchemaFile(filePath, options.basePath);
    const path = relative(options.basePath, filePath);
    
    if (result.success && result.types !== undefined) {
      addTypes(collected, result.types, errors, path);
    } else if (result.error !== undefined) {
      errors.push({ path, error: result.error, code: result.code });
    }
  }
  
  return { types: [...collected.values()], errors };
}

/**
 * Load schemas from content strings (for testing or in-memory use).
 * 
 * @param schemas - Map of path to content string
 * @returns SchemaLoadAllResult with the declared types and any errors
 */
export function loadSchemasFromContent(
  schemas: Map<string, string>
): SchemaLoadAllResult {
  const collected = new Map<string, TypeDef>();
  const errors: SchemaLoadError[] = [];
  
  for (const [path, content] of schemas) {
    try {
      addTypes(collected, parseSchemaDocument(content, path), errors, path);
    } catch (err) {
      errors.push({ path, error: describeError(err), code: err instanceof SchemaError ? err.code : undefined });
    }
  }
  
  return { types: [...collected.values()], errors };
}

/**
 * Load a schema from a single document or a directory of documents,
 * failing on the first reported error.
 *
 * @throws SchemaError when any document fails to load
 */
export async function loadSchema(path: string, recursive = true): Promise<TypeDef[]> {
  const stats = await stat(path);
  if (stats.isFile()) {
    const content = await readFile(path, 'utf-8');
    return parseSchemaDocument(content, basename(path));
  }

  const result = await loadAllSchemas({ basePath: path, recursive });
  const [first] = result.errors;
  if (first !== undefined) {
    const summary = result.errors.map(e => `${e.path}: ${e.error}`).join('; ');
    throw new SchemaError(
      first.code ?? 'InvalidDocument',
      `Failed to load ${result.errors.length} schema document(s): ${summary}`,
    );
  }
  return result.types;
}
