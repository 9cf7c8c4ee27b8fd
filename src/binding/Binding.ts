/**
 * Binding — a parsed, include-resolved binding document.
 *
 * This module handles:
 * - Normalizing the legacy `child-binding:` block into a `node` property
 * - Resolving `include:` depth first, with property filters
 * - Validating the merged document against its dialect
 * - Building the property-spec and child-binding tables
 *
 * It does NOT handle:
 * - Locating binding files (that's BindingCatalog's job)
 * - Matching bindings to nodes (that's the partial trees' job)
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { SchemaError } from '../errors.js';
import { PropertySpec } from './PropertySpec.js';
import {
  checkIncludeFilter,
  filterProperties,
  mergeFilterList,
  parseChildFilter,
  readFilterList,
} from './filter.js';
import { mergeDocuments } from './merge.js';
import { matchesPattern } from './pattern.js';
import { isStringList, isValidDefault, isYamlMap } from './values.js';
import type { BindingDialect, IncludeResolver, PropertyFilter, YamlMap } from './types.js';

/**
 * Types that may carry a `const:`.
 */
const CONST_TYPES: ReadonlySet<string> = new Set(['int', 'array', 'uint8-array', 'string', 'string-array']);

/**
 * Options for resolving a binding.
 */
export interface BindingOptions {
  /** Path of the binding document, used for origins and messages */
  path: string;
  dialect: BindingDialect;
  /** Filter applied to every included document */
  filter?: PropertyFilter;
  /** Missing schema identifier is an error (default: true) */
  requireSchema?: boolean;
  /** Missing description is an error (default: true) */
  requireDescription?: boolean;
}

interface ExpandContext {
  includes: IncludeResolver;
  dialect: BindingDialect;
  bindingPath: string;
}

interface IncludeEntry {
  name: string;
  filter: PropertyFilter;
}

function show(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Parse binding text into a mapping.
 */
export function parseBindingDocument(source: string, path: string): YamlMap {
  let parsed: unknown;
  try {
    parsed = parseYaml(source);
  } catch (err) {
    throw new SchemaError(`failed to parse YAML: ${err instanceof Error ? err.message : String(err)}`, path);
  }
  if (!isYamlMap(parsed)) {
    throw new SchemaError('invalid contents, expected a mapping', path);
  }
  return parsed;
}

/**
 * Move a legacy `child-binding:` block to `properties['.*']`, recursively.
 */
function normalizeChildBinding(doc: YamlMap, path: string): void {
  if (!('child-binding' in doc)) {
    return;
  }
  const child = doc['child-binding'];
  if (!isYamlMap(child)) {
    throw new SchemaError("malformed 'child-binding:', expected a binding (dictionary with keys/values)", path);
  }
  delete doc['child-binding'];
  normalizeChildBinding(child, path);
  child.type = 'node';

  let props = doc.properties;
  if (props === undefined || props === null) {
    props = {};
    doc.properties = props;
  }
  if (!isYamlMap(props)) {
    throw new SchemaError("malformed 'properties:', expected a mapping", path);
  }
  props['.*'] = child;
}

function parseIncludeEntry(entry: unknown, inherited: PropertyFilter, bindingPath: string): IncludeEntry {
  if (typeof entry === 'string') {
    return {
      name: entry,
      filter: { allowlist: inherited.allowlist, blocklist: inherited.blocklist, child: inherited.child },
    };
  }
  if (!isYamlMap(entry)) {
    throw new SchemaError(
      "all elements in 'include:' should be either strings or maps with a 'name' key " +
        `and optional 'property-allowlist' or 'property-blocklist' keys, but got: ${show(entry)}`,
      bindingPath,
    );
  }

  const { name, 'property-allowlist': allow, 'property-blocklist': block, 'child-binding': childRaw, ...rest } = entry;
  const allowlist = mergeFilterList(readFilterList('property-allowlist', allow, bindingPath), inherited.allowlist);
  const blocklist = mergeFilterList(readFilterList('property-blocklist', block, bindingPath), inherited.blocklist);
  if (Object.keys(rest).length > 0) {
    throw new SchemaError(`'include:' should not have these unexpected contents: ${show(rest)}`, bindingPath);
  }
  const includeName = typeof name === 'string' ? name : undefined;
  checkIncludeFilter(includeName, allowlist, blocklist, bindingPath);

  return {
    name: includeName,
    filter: { allowlist, blocklist, child: parseChildFilter(childRaw, includeName, bindingPath) ?? inherited.child },
  };
}

/**
 * Resolve the includes of `doc` in place, depth first.
 *
 * @returns property name -> file that last defined it
 */
function expandDocument(doc: YamlMap, docPath: string, filter: PropertyFilter, ctx: ExpandContext): Map<string, string> {
  const props = doc.properties;
  const own = isYamlMap(props) ? Object.keys(props) : [];
  const propagated: PropertyFilter = { allowlist: filter.allowlist, blocklist: filter.blocklist };

  // Child declarations resolve their own includes before this level merges.
  if (isYamlMap(props)) {
    for (const decl of Object.values(props)) {
      if (isYamlMap(decl) && decl.type === 'node') {
        expandDocument(decl, docPath, propagated, ctx);
      }
    }
  }

  const origins = new Map<string, string>();
  if ('include' in doc) {
    const raw = doc.include;
    delete doc.include;
    if (typeof raw !== 'string' && !Array.isArray(raw)) {
      throw new SchemaError(`'include:' should be a string or list, but has type ${typeof raw}`, ctx.bindingPath);
    }
    const entries: unknown[] = typeof raw === 'string' ? [raw] : raw;

    const merged: YamlMap = {};
    for (const entry of entries) {
      const include = parseIncludeEntry(entry, filter, ctx.bindingPath);
      const found = ctx.includes.resolve(include.name);
      if (found === undefined) {
        throw new SchemaError(`'${include.name}' not found`, ctx.bindingPath);
      }
      const included = parseBindingDocument(found.source, found.path);
      normalizeChildBinding(included, found.path);
      filterProperties(included.properties, include.filter);

      const nested = expandDocument(
        included,
        found.path,
        { allowlist: include.filter.allowlist, blocklist: include.filter.blocklist },
        ctx,
      );
      for (const [name, origin] of nested) {
        origins.set(name, origin);
      }
      mergeDocuments(ctx.bindingPath, merged, included, false, ctx.dialect.overridableKeys);
    }
    mergeDocuments(ctx.bindingPath, doc, merged, true, ctx.dialect.overridableKeys);
  }

  for (const name of own) {
    origins.set(name, docPath);
  }
  return origins;
}

export class Binding {
  readonly path: string;
  readonly dialect: BindingDialect;
  /** The merged and filtered document */
  readonly document: YamlMap;
  readonly isChild: boolean;
  /** Property name pattern -> spec, in declaration order */
  readonly propertySpecs: ReadonlyMap<string, PropertySpec>;
  /** Child node name pattern -> bindings for matching children */
  readonly childBindings: ReadonlyMap<string, readonly Binding[]>;
  /** Buses this node provides to its children */
  readonly buses: readonly string[];
  /** Specifier space -> cell names, from `<space>-cells:` */
  readonly specifierCells: ReadonlyMap<string, readonly string[]>;

  /**
   * Parse and resolve a binding document.
   */
  static resolve(sourceText: string, includes: IncludeResolver, options: BindingOptions): Binding {
    return Binding.fromDocument(parseBindingDocument(sourceText, options.path), includes, options);
  }

  /**
   * Resolve an already parsed binding document. The input is not modified.
   */
  static fromDocument(doc: YamlMap, includes: IncludeResolver, options: BindingOptions): Binding {
    const working = structuredClone(doc);
    normalizeChildBinding(working, options.path);
    const origins = expandDocument(working, options.path, options.filter ?? {}, {
      includes,
      dialect: options.dialect,
      bindingPath: options.path,
    });
    return new Binding(working, options, origins, false);
  }

  private constructor(doc: YamlMap, options: BindingOptions, origins: ReadonlyMap<string, string>, isChild: boolean) {
    this.path = options.path;
    this.dialect = options.dialect;
    this.document = doc;
    this.isChild = isChild;

    this.check(options.requireSchema ?? true, options.requireDescription ?? true);

    const specs = new Map<string, PropertySpec>();
    const children = new Map<string, Binding[]>();
    for (const [name, decl] of Object.entries(this.declarations())) {
      const origin = origins.get(name) ?? this.path;
      if (!isYamlMap(decl)) {
        continue;
      }
      if (decl.type === 'node') {
        const child = new Binding(
          decl,
          { path: origin, dialect: this.dialect, requireSchema: false, requireDescription: false },
          new Map(),
          true,
        );
        children.set(name, [...(children.get(name) ?? []), child]);
      } else {
        specs.set(name, this.buildSpec(name, origin, decl));
      }
    }
    this.propertySpecs = specs;
    this.childBindings = children;

    const bus = doc.bus;
    this.buses = this.dialect.kind === 'hardware' ? (typeof bus === 'string' ? [bus] : isStringList(bus) ? bus : []) : [];

    const cells = new Map<string, string[]>();
    if (this.dialect.kind === 'hardware') {
      for (const [key, value] of Object.entries(doc)) {
        if (key.endsWith('-cells') && isStringList(value)) {
          cells.set(key.slice(0, -'-cells'.length), value);
        }
      }
    }
    this.specifierCells = cells;
  }

  /** Schema identifier, or null for anonymous child bindings */
  get schema(): string | null {
    const value = this.document[this.dialect.schemaKey(this.document)];
    return typeof value === 'string' ? value : null;
  }

  get description(): string | undefined {
    const value = this.document.description;
    return typeof value === 'string' ? value : undefined;
  }

  /** Bus the node must sit on for this binding to apply */
  get variant(): string | null {
    const value = this.document['on-bus'];
    return this.dialect.kind === 'hardware' && typeof value === 'string' ? value : null;
  }

  /**
   * Specs whose name pattern matches `propName`.
   */
  matchingSpecs(propName: string): PropertySpec[] {
    return [...this.propertySpecs.values()].filter(spec => matchesPattern(spec.name, propName));
  }

  /**
   * Child bindings whose name pattern matches `nodeName`.
   */
  childBindingsFor(nodeName: string): Binding[] {
    const result: Binding[] = [];
    for (const [pattern, bindings] of this.childBindings) {
      if (matchesPattern(pattern, nodeName)) {
        result.push(...bindings);
      }
    }
    return result;
  }

  /**
   * Serialize the merged document. Resolving the output yields an equal binding.
   */
  toSource(): string {
    return stringifyYaml(this.document);
  }

  toString(): string {
    const schema = this.schema ? ` for schema '${this.schema}'` : '';
    const variant = this.variant ? ` on '${this.variant}'` : '';
    return `<Binding ${this.path}${schema}${variant}>`;
  }

  private declarations(): YamlMap {
    const props = this.document.properties;
    return isYamlMap(props) ? props : {};
  }

  private buildSpec(name: string, origin: string, decl: YamlMap): PropertySpec {
    const type = String(decl.type);
    const typeInfo = this.dialect.propertyTypes[type];
    if (typeInfo === undefined) {
      throw new SchemaError(`'${name}' has unknown type '${type}'`, this.path);
    }
    const space = decl['specifier-space'];
    return new PropertySpec({
      name,
      path: origin,
      type,
      typeInfo,
      description: typeof decl.description === 'string' ? decl.description : undefined,
      enum: Array.isArray(decl.enum) ? decl.enum : undefined,
      const: decl.const ?? undefined,
      default: decl.default ?? undefined,
      required: decl.required === true,
      deprecated: decl.deprecated === true,
      specifierSpace: typeof space === 'string' ? space : undefined,
    });
  }

  private check(requireSchema: boolean, requireDescription: boolean): void {
    const doc = this.document;
    const schemaKey = this.dialect.schemaKey(doc);

    const schema = doc[schemaKey];
    if (schema !== undefined && schema !== null) {
      if (typeof schema !== 'string') {
        throw new SchemaError(`malformed '${schemaKey}: ${show(schema)}' field - should be a string`, this.path);
      }
    } else if (requireSchema) {
      throw new SchemaError(`missing '${schemaKey}' property`, this.path);
    }

    if ('description' in doc) {
      if (typeof doc.description !== 'string' || doc.description.length === 0) {
        throw new SchemaError("malformed or empty 'description'", this.path);
      }
    } else if (requireDescription) {
      throw new SchemaError("missing 'description'", this.path);
    }

    for (const key of Object.keys(doc)) {
      const hint = this.dialect.legacyKeys[key];
      if (hint !== undefined) {
        throw new SchemaError(`legacy '${key}:', ${hint}`, this.path);
      }
    }

    const topLevel = this.topLevelKeys(doc);
    for (const key of Object.keys(doc)) {
      if (this.dialect.kind === 'hardware' && key.endsWith('-cells')) {
        continue;
      }
      if (!topLevel.has(key)) {
        throw new SchemaError(`unknown key '${key}', expected one of ${[...topLevel].join(', ')}`, this.path);
      }
    }
    this.dialect.checkDocument(doc, this.path);

    const props = doc.properties;
    if (props !== undefined && props !== null && !isYamlMap(props)) {
      throw new SchemaError("malformed 'properties:', expected a mapping", this.path);
    }
    for (const [name, decl] of Object.entries(this.declarations())) {
      if (!isYamlMap(decl)) {
        throw new SchemaError(`malformed 'properties: ${name}', expected a mapping`, this.path);
      }
      this.checkProperty(name, decl);
    }
  }

  private topLevelKeys(doc: YamlMap, child = this.isChild): Set<string> {
    const keys = new Set([this.dialect.schemaKey(doc), 'description', 'properties', ...this.dialect.topLevelKeys]);
    if (child) {
      keys.add('type');
    }
    return keys;
  }

  private checkProperty(name: string, decl: YamlMap): void {
    const isNode = decl.type === 'node';
    const childKeys = isNode ? this.topLevelKeys(decl, true) : undefined;
    for (const key of Object.keys(decl)) {
      if (childKeys?.has(key) || (isNode && this.dialect.kind === 'hardware' && key.endsWith('-cells'))) {
        continue;
      }
      if (!this.dialect.propertyKeys.has(key)) {
        throw new SchemaError(
          `unknown setting '${key}' in 'properties: ${name}: ...', expected one of ${[...this.dialect.propertyKeys].join(', ')}`,
          this.path,
        );
      }
    }

    if (!isNode) {
      this.checkPropertyType(name, decl);
    }

    for (const option of ['required', 'deprecated']) {
      if (option in decl && typeof decl[option] !== 'boolean') {
        throw new SchemaError(
          `malformed '${option}:' setting '${show(decl[option])}' for '${name}' in 'properties', expected true/false`,
          this.path,
        );
      }
    }
    if (decl.deprecated === true && decl.required === true) {
      throw new SchemaError(`'${name}' in 'properties' should not have both 'deprecated' and 'required' set`, this.path);
    }
    if ('description' in decl && typeof decl.description !== 'string') {
      throw new SchemaError(`missing, malformed, or empty 'description' for '${name}' in 'properties'`, this.path);
    }
    if ('enum' in decl && !Array.isArray(decl.enum)) {
      throw new SchemaError(`enum for property '${name}' is not a list`, this.path);
    }
  }

  private checkPropertyType(name: string, decl: YamlMap): void {
    const type = decl.type;
    if (type === undefined || type === null) {
      throw new SchemaError(`missing 'type:' for '${name}' in 'properties'`, this.path);
    }
    const types = this.dialect.propertyTypes;
    if (typeof type !== 'string' || !Object.hasOwn(types, type) || type === 'node') {
      throw new SchemaError(
        `'${name}' in 'properties:' has unknown type '${show(type)}', expected one of ` +
          Object.keys(types).filter(t => t !== 'node').join(', '),
        this.path,
      );
    }
    const info = types[type];
    if (info === undefined) {
      return;
    }

    this.dialect.checkProperty(name, decl, this.path);

    if (decl.const !== undefined && decl.const !== null && !CONST_TYPES.has(type)) {
      throw new SchemaError(
        `const for property '${name}' has type '${type}', expected one of ${[...CONST_TYPES].join(', ')}`,
        this.path,
      );
    }
    const constant = decl.const;
    if (info.kind === 'byte-array' && constant !== undefined && constant !== null && !isValidDefault(info.kind, constant)) {
      throw new SchemaError(
        `'const: ${show(constant)}' is invalid for '${name}' in 'properties:', which has type ${type}`,
        this.path,
      );
    }

    const value = decl.default;
    if (value === undefined || value === null) {
      return;
    }
    if (!info.defaultAllowed) {
      throw new SchemaError(`'default:' can't be combined with 'type: ${type}' for '${name}' in 'properties:'`, this.path);
    }
    if (!isValidDefault(info.kind, value)) {
      throw new SchemaError(
        `'default: ${show(value)}' is invalid for '${name}' in 'properties:', which has type ${type}`,
        this.path,
      );
    }
  }
}
