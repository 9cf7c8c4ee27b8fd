/**
 * ConfigNode — a node of the software configuration tree.
 *
 * Raw values are whatever the YAML parser produced for the node's non-map
 * entries. A node's name is its label candidate; the merged tree decides
 * whether it is unique enough to be public.
 */

import { SourceError } from '../../errors.js';
import { isStringList } from '../../binding/values.js';
import { TreeNode } from '../TreeNode.js';

/**
 * What a configuration node needs from its tree.
 */
export interface ConfigNodeContext {
  readonly sourcePath: string;
  /** Path of the node a pointer names; throws when it names none */
  resolvePointer(pointer: string, from: ConfigNode, propName: string): string;
}

function schemasFrom(path: string, raw: ReadonlyMap<string, unknown>): string[] {
  const value = raw.get('schema');
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (isStringList(value)) {
    return [...value];
  }
  throw new SourceError("invalid 'schema' property in config node, expected a string or a list of strings", path);
}

export class ConfigNode extends TreeNode<unknown> {
  private readonly isEnabled: boolean;

  constructor(
    path: string,
    raw: ReadonlyMap<string, unknown>,
    private readonly context: ConfigNodeContext,
  ) {
    super(path, raw, schemasFrom(path, raw));
    const enabled = raw.get('enabled') ?? true;
    if (typeof enabled !== 'boolean') {
      throw new SourceError(`'enabled' must be a boolean, not ${JSON.stringify(enabled)}`, path);
    }
    this.isEnabled = enabled;
  }

  get sourcePath(): string {
    return this.context.sourcePath;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  get labels(): readonly string[] {
    return this.parentPath === null ? [] : [this.name];
  }

  resolvePointer(pointer: string, propName: string): string {
    return this.context.resolvePointer(pointer, this, propName);
  }
}
