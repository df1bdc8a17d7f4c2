/**
 * Transport registry: fans one entry out to every configured transport
 *
 * Each transport is attempted independently. A transport that throws, or
 * whose returned promise rejects, is reported on the console and the
 * remaining transports still receive the entry.
 *
 * @example
 * ```typescript
 * const registry = new TransportRegistry();
 * registry.add(new ConsoleTransport());
 * registry.add(new FileTransport({ directory: '/var/log/app' }));
 *
 * registry.writeToAll(entry);
 *
 * await registry.flushAll();
 * await registry.closeAll();
 * ```
 */

import type { LogEntry, Transport } from './types.js';

type TransportOperation = 'write' | 'flush' | 'close';

/**
 * Registry for managing transport instances with error isolation and lifecycle management
 */
export class TransportRegistry {
  private readonly transports: Transport[] = [];

  constructor(transports: readonly Transport[] = []) {
    transports.forEach(transport => this.add(transport));
  }

  /**
   * Add a transport to the registry
   *
   * @throws {TypeError} If transport is invalid
   * @throws {Error} If a transport with the same name is already registered
   */
  add(transport: Transport): void {
    if (!transport || typeof transport !== 'object') {
      throw new TypeError('Transport must be a valid object');
    }
    if (typeof transport.write !== 'function') {
      throw new TypeError('Transport must have a write method');
    }
    if (!transport.name || typeof transport.name !== 'string') {
      throw new TypeError('Transport must have a valid name');
    }
    if (this.transports.some(t => t.name === transport.name)) {
      throw new Error(`Transport with name '${transport.name}' already exists`);
    }

    this.transports.push(transport);
  }

  /**
   * Remove a transport from the registry by name
   *
   * @returns True if transport was found and removed, false otherwise
   */
  remove(transportName: string): boolean {
    const index = this.transports.findIndex(t => t.name === transportName);
    if (index < 0) return false;
    this.transports.splice(index, 1);
    return true;
  }

  /**
   * Write an entry to all registered transports, in registration order
   */
  writeToAll(entry: LogEntry): void {
    for (const transport of this.transports) {
      try {
        const result = transport.write(entry);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.handleTransportError(transport.name, 'write', error));
        }
      } catch (error) {
        this.handleTransportError(transport.name, 'write', error);
      }
    }
  }

  /**
   * Flush all registered transports in parallel
   */
  async flushAll(): Promise<void> {
    await Promise.all(this.transports.map(transport => this.settle(transport, 'flush')));
  }

  /**
   * Close all registered transports in parallel and clear the registry
   */
  async closeAll(): Promise<void> {
    await Promise.all(this.transports.map(transport => this.settle(transport, 'close')));
    this.transports.length = 0;
  }

  /**
   * Get the list of registered transport names
   */
  getTransportNames(): string[] {
    return this.transports.map(t => t.name);
  }

  getTransport(name: string): Transport | undefined {
    return this.transports.find(t => t.name === name);
  }

  get size(): number {
    return this.transports.length;
  }

  get isEmpty(): boolean {
    return this.transports.length === 0;
  }

  private async settle(transport: Transport, operation: 'flush' | 'close'): Promise<void> {
    try {
      await transport[operation]();
    } catch (error) {
      this.handleTransportError(transport.name, operation, error);
    }
  }

  private handleTransportError(transportName: string, operation: TransportOperation, error: unknown): void {
    // Reported on the console rather than through a logger to avoid loops
    console.error(`Transport ${transportName} ${operation} failed:`, error);
  }
}
