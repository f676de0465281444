import { DEFAULT_CORE_OPERATIONS, getMetaTool, type MetaTool } from './bootstrap.js';
import { CatalogStore } from './catalog-store.js';
import { discover, type DiscoveryOptions } from './discovery.js';
import { dispatch } from './dispatcher.js';
import { UpstreamError } from './errors.js';
import { resolve } from './resolver.js';
import type {
  CatalogIndex,
  CatalogOperation,
  CatalogOperationResult,
  OperationContext,
  SimplificationPolicy,
  ToolDescriptor,
  UpstreamClient,
} from './types.js';

export interface CatalogEngineConfig {
  store: CatalogStore;
  client: UpstreamClient;
  timeoutMs?: number;
  policy?: SimplificationPolicy;
  discovery?: Omit<DiscoveryOptions, 'coreOperations'>;
  coreOperations?: readonly string[];
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new UpstreamError('Operation cancelled by caller', { kind: 'timeout', cause: signal.reason });
  }
}

export type ToolDescription =
  | { kind: 'meta'; tool: MetaTool }
  | { kind: 'catalog'; tool: ToolDescriptor };

/**
 * Single entry point for the three things an agent can ask of the catalog.
 * Each call reads one index snapshot, so a concurrent reload never mixes
 * two catalogs within one operation.
 */
export class CatalogEngine {
  private store: CatalogStore;
  private client: UpstreamClient;
  private timeoutMs?: number;
  private policy?: SimplificationPolicy;
  private discoveryOptions: DiscoveryOptions;

  constructor(config: CatalogEngineConfig) {
    this.store = config.store;
    this.client = config.client;
    this.timeoutMs = config.timeoutMs;
    this.policy = config.policy;
    this.discoveryOptions = {
      ...config.discovery,
      coreOperations: config.coreOperations ?? DEFAULT_CORE_OPERATIONS,
    };
  }

  get coreOperations(): readonly string[] {
    return this.discoveryOptions.coreOperations ?? DEFAULT_CORE_OPERATIONS;
  }

  snapshot(): CatalogIndex {
    return this.store.current();
  }

  async execute(operation: CatalogOperation, context: OperationContext = {}): Promise<CatalogOperationResult> {
    const index = this.store.current();

    switch (operation.kind) {
      case 'discover':
        throwIfCancelled(context.signal);
        return { kind: 'discover', result: discover(index, operation.query, this.discoveryOptions) };
      case 'resolve':
        throwIfCancelled(context.signal);
        return { kind: 'resolve', tool: resolve(index, operation.toolName) };
      case 'dispatch': {
        const result = await dispatch(
          index,
          operation.invocation,
          { client: this.client, timeoutMs: this.timeoutMs, policy: this.policy },
          context,
        );
        return { kind: 'dispatch', result };
      }
    }
  }

  /** Schema lookup that also covers the hand-authored meta-tools */
  describe(name: string): ToolDescription {
    const meta = getMetaTool(name);
    if (meta) return { kind: 'meta', tool: meta };
    return { kind: 'catalog', tool: resolve(this.store.current(), name) };
  }
}
