export interface RelayReport {
  generated: Date;
  hostname: string;
  /** The control session could not be opened or authenticated; nothing else was collected. */
  connectionFailed: boolean;

  version?: string;
  uptimeSeconds?: number;
  uptimeHuman?: string;
  bytesRead?: number;
  bytesWritten?: number;

  fingerprint?: string;
  nickname?: string;
  address?: string;
  orPort?: string;

  circuitsEstablished?: boolean;
  connectionCount?: number;

  flags?: string[];
  consensus?: RouterStatusEntry;
  accounting?: AccountingInfo;

  warnings: string[];
  errors: string[];
}

/**
 * The relay's own entry in the network consensus.
 */
export interface RouterStatusEntry {
  nickname: string;
  fingerprint: string;
  flags: string[];
  bandwidth?: number;
  published?: Date;
  address?: string;
  orPort?: number;
}

export interface AccountingInfo {
  bytesLeft: string;
  intervalEnd: string;
}
