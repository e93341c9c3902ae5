/**
 * Caps concurrent WebSocket connections per client address.
 */
export class ConnectionLimiter {
  private readonly connections = new Map<string, number>();

  constructor(readonly maxPerAddress: number) {}

  /** Reserves a slot; false when the address is at its limit. */
  tryConnect(address: string): boolean {
    const current = this.connections.get(address) ?? 0;
    if (current >= this.maxPerAddress) return false;
    this.connections.set(address, current + 1);
    return true;
  }

  /** Releases a slot. Addresses with no open connections are forgotten. */
  disconnect(address: string): void {
    const current = this.connections.get(address) ?? 0;
    if (current <= 1) {
      this.connections.delete(address);
      return;
    }
    this.connections.set(address, current - 1);
  }

  count(address: string): number {
    return this.connections.get(address) ?? 0;
  }

  get trackedAddresses(): number {
    return this.connections.size;
  }
}
