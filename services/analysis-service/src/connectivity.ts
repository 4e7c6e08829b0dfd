import type { ConnectivityQuality } from "./config";

export type ConnectivityMonitor = {
  getQuality: () => ConnectivityQuality;
};

export function isConnected(quality: ConnectivityQuality): boolean {
  return quality !== "OFFLINE";
}

export class StaticConnectivityMonitor implements ConnectivityMonitor {
  constructor(private quality: ConnectivityQuality) {}

  getQuality(): ConnectivityQuality {
    return this.quality;
  }

  setQuality(quality: ConnectivityQuality): void {
    this.quality = quality;
  }
}
