/**
 * @packageDocumentation
 * @module MessageLog
 * @description
 * Append-only audit trail of cross-chain messages handled by the bridge.
 *
 * Every accepted send (`MessageSent`) and every applied delivery (`MessageReceived`)
 * is recorded here and echoed as a JSON line, so off-chain tooling can reconcile
 * what left and what arrived.
 *
 * Records:
 * - Relay message id
 * - Direction and counterparty chain selector
 * - Token id and receiving owner/contract
 * - Fee token and fee paid (outbound only)
 */
import { randomUUID } from 'crypto';
import type { EventEmitter } from 'events';
import type { BridgeEvents, HistoryOptions, Hex } from '../types/bridge';

export interface MessageRecord {
  id: string;
  direction: 'outbound' | 'inbound';
  messageId: Hex;
  chainSelector: bigint;
  counterparty: string;
  tokenId?: bigint;
  feeToken?: string;
  fee?: bigint;
  timestamp: number;
}

export class MessageLog {
  private records: MessageRecord[] = [];

  constructor(private readonly options: { silent?: boolean } = {}) { }

  async log(entry: Omit<MessageRecord, 'id' | 'timestamp'>): Promise<MessageRecord> {
    const record: MessageRecord = {
      ...entry,
      id: randomUUID(),
      timestamp: Date.now(),
    };

    this.records.push(record);

    if (!this.options.silent) {
      console.log('AUDIT:', serializeRecord(record));
    }
    return record;
  }

  async getLogs(options: HistoryOptions = {}): Promise<MessageRecord[]> {
    let logs = [...this.records];

    if (options.direction !== undefined) {
      logs = logs.filter(l => l.direction === options.direction);
    }
    if (options.chainSelector !== undefined) {
      logs = logs.filter(l => l.chainSelector === options.chainSelector);
    }

    // Filter by time
    if (options.startTime !== undefined) {
      const start = options.startTime;
      logs = logs.filter(l => l.timestamp >= start);
    }
    if (options.endTime !== undefined) {
      const end = options.endTime;
      logs = logs.filter(l => l.timestamp <= end);
    }

    // Newest first; stable for records within the same millisecond
    logs = logs
      .map((record, index) => ({ record, index }))
      .sort((a, b) => b.record.timestamp - a.record.timestamp || b.index - a.index)
      .map(({ record }) => record);

    const offset = options.offset || 0;
    const limit = options.limit || 50;

    return logs.slice(offset, offset + limit);
  }

  async findByMessageId(messageId: Hex): Promise<MessageRecord[]> {
    const needle = messageId.toLowerCase();
    return this.records.filter(r => r.messageId.toLowerCase() === needle);
  }
}

export function serializeRecord(record: MessageRecord): string {
  return JSON.stringify(record, (_key, value) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Records a committed send or delivery and emits its event. Neither step may fail the
 * entry point, since the ledger change already stands; failures go to `console.error`.
 */
export async function notify<K extends keyof BridgeEvents>(
  source: string,
  log: MessageLog,
  events: EventEmitter,
  name: K,
  event: Parameters<BridgeEvents[K]>[0],
  entry: Omit<MessageRecord, 'id' | 'timestamp'>
): Promise<void> {
  try {
    await log.log(entry);
  } catch (error) {
    console.error(`[${source}] Failed to record ${name} ${entry.messageId}:`, error);
  }

  try {
    events.emit(name, event);
  } catch (error) {
    console.error(`[${source}] ${name} listener failed for ${entry.messageId}:`, error);
  }
}
