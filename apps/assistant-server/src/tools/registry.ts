import { DuplicateToolNameError, MissingTransactionKeyError, RegistrySealedError, ToolNotFoundError } from '../errors';
import type { ToolInputSchema } from './schema';
import type { ToolSpec } from './types';

export interface ToolDescriptor {
  name: string;
  description: string;
  sideEffect: ToolSpec['sideEffect'];
  inputSchema: ToolInputSchema;
}

/**
 * Catalog of tools, filled once at startup and sealed before the first
 * conversation. After sealing it is read-only.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolSpec>();
  private sealed = false;

  constructor(toolSpecs: ToolSpec[] = []) {
    for (const spec of toolSpecs) {
      this.register(spec);
    }
  }

  register(spec: ToolSpec): void {
    if (this.sealed) {
      throw new RegistrySealedError(spec.name);
    }
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolNameError(spec.name);
    }
    if (spec.sideEffect === 'write-once' && !spec.transactionKey) {
      throw new MissingTransactionKeyError(spec.name);
    }
    this.tools.set(spec.name, spec);
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  lookup(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  get(name: string): ToolSpec {
    const spec = this.tools.get(name);
    if (!spec) {
      throw new ToolNotFoundError(name);
    }
    return spec;
  }

  list(): ToolSpec[] {
    return [...this.tools.values()];
  }

  describe(): ToolDescriptor[] {
    return this.list().map((spec) => ({
      name: spec.name,
      description: spec.description,
      sideEffect: spec.sideEffect,
      inputSchema: spec.inputSchema,
    }));
  }
}
