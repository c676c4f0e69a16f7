import { createConnection } from 'node:net';

import { LOCAL_NODE_ALIASES } from './definitions.js';
import { localNodeId } from './info.js';

export { nodeLabel } from './definitions.js';

/** Confirms that a node can be reached before any workload starts. */
export interface NodeProbe {
  isReachable(node: string, signal?: AbortSignal): Promise<boolean>;
}

export function isLocalNode(node: string, localId: string = localNodeId()): boolean {
  return node === localId || LOCAL_NODE_ALIASES.includes(node);
}

/**
 * TCP reachability check: a node is reachable when a connection to `port`
 * opens within `timeoutMs`. This host is always reachable.
 */
export class TcpNodeProbe implements NodeProbe {
  constructor(
    private readonly port: number = 22,
    private readonly timeoutMs: number = 5_000,
    private readonly localId: string = localNodeId(),
  ) {}

  isReachable(node: string, signal?: AbortSignal): Promise<boolean> {
    if (isLocalNode(node, this.localId)) return Promise.resolve(true);
    return new Promise((resolve) => {
      const socket = createConnection({ host: node, port: this.port, timeout: this.timeoutMs, signal });
      const finish = (reachable: boolean) => {
        socket.destroy();
        resolve(reachable);
      };
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}
