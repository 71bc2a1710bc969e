/**
 * File: src/core/app/connectors/feed/decoder.ts
 * Summary: Incremental decoder turning raw timing-feed bytes into typed timing events.
 */

import {
  buildCompetitorDisplayName,
  type SessionState,
  type TimingEvent,
} from '@core/domain';

import { isBlankFeedTime, parseFeedInteger, parseFeedTime, splitFeedRecord } from './packet';

const NEWLINE = 0x0a;
const DEFAULT_MAX_PACKET_BYTES = 4096;

/** Records we understand but that carry nothing the engine consumes. */
const IGNORED_TAGS = new Set(['$C', '$E', '$H', '$I']);

const LIVE_FLAGS = new Set(['green', 'yellow', 'red']);
const ENDED_FLAGS = new Set(['finish', 'finished', 'checkered', 'chequered', 'chequer']);

export type FeedIssueKind = 'malformed' | 'unknown' | 'orphaned' | 'overflow';

export type FeedIssue = {
  kind: FeedIssueKind;
  reason: string;
  /** The offending packet text, cut to a loggable length. */
  packet: string;
};

export type FeedDecoderStats = {
  packets: number;
  events: number;
  ignored: number;
  unknown: number;
  malformed: number;
  orphaned: number;
  overflowed: number;
};

export type FeedDecoderOptions = {
  maxPacketBytes?: number;
  onIssue?: (issue: FeedIssue) => void;
};

type DecodeResult =
  | { event: TimingEvent }
  | { issue: Exclude<FeedIssueKind, 'overflow'>; reason: string }
  | null;

const flagToState = (flag: string): SessionState | null => {
  const normalised = flag.trim().toLowerCase();
  if (LIVE_FLAGS.has(normalised)) {
    return 'live';
  }

  if (ENDED_FLAGS.has(normalised)) {
    return 'ended';
  }

  return null;
};

const field = (fields: ReadonlyArray<string>, index: number) => fields[index] ?? '';

const optionalTime = (value: string): number | null | 'invalid' => {
  if (isBlankFeedTime(value)) {
    return null;
  }

  return parseFeedTime(value) ?? 'invalid';
};

/**
 * Newline-framed decoder for the `$`-tagged timing protocol. Bytes may arrive
 * in any chunking; partial packets are buffered until their delimiter shows
 * up. Unknown and malformed packets are counted and skipped.
 *
 * The decoder keeps only the context the protocol needs to attribute records:
 * the current run and a per-competitor passing counter used to number laps.
 * A race record whose elapsed time matches the competitor's last passing
 * describes that passing and corrects the counter. Any other race record
 * reporting more laps than counted is held until the next passing: if the
 * elapsed times match, that passing takes the reported lap number, otherwise
 * the race record covered passings the feed never sent and numbering
 * continues after it.
 */
export class FeedDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  private discardingOverflow = false;

  private sessionId: string | null = null;

  private readonly passings = new Map<string, number>();

  private readonly lastPassingElapsed = new Map<string, number | null>();

  private readonly pendingLapCounts = new Map<string, { laps: number; elapsedMs: number }>();

  private readonly counters: FeedDecoderStats = {
    packets: 0,
    events: 0,
    ignored: 0,
    unknown: 0,
    malformed: 0,
    orphaned: 0,
    overflowed: 0,
  };

  private readonly maxPacketBytes: number;

  constructor(private readonly options: FeedDecoderOptions = {}) {
    this.maxPacketBytes = options.maxPacketBytes ?? DEFAULT_MAX_PACKET_BYTES;
  }

  get stats(): FeedDecoderStats {
    return { ...this.counters };
  }

  get currentSessionId(): string | null {
    return this.sessionId;
  }

  /** Number of bytes waiting for a delimiter. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array | string): TimingEvent[] {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const events: TimingEvent[] = [];
    let start = 0;
    let newline = this.buffer.indexOf(NEWLINE, start);

    while (newline !== -1) {
      const packet = this.buffer.subarray(start, newline);
      start = newline + 1;

      if (this.discardingOverflow) {
        this.discardingOverflow = false;
      } else if (packet.length > this.maxPacketBytes) {
        this.recordOverflow(packet);
      } else {
        const event = this.decodeBytes(packet);
        if (event) {
          events.push(event);
        }
      }

      newline = this.buffer.indexOf(NEWLINE, start);
    }

    this.buffer = this.buffer.subarray(start);

    if (this.discardingOverflow) {
      this.buffer = Buffer.alloc(0);
    } else if (this.buffer.length > this.maxPacketBytes) {
      this.recordOverflow(this.buffer);
      this.buffer = Buffer.alloc(0);
      this.discardingOverflow = true;
    }

    return events;
  }

  /** Decodes whatever is left in the buffer as a final packet (end of a finite source). */
  end(): TimingEvent[] {
    const remaining = this.buffer;
    const discarding = this.discardingOverflow;
    this.buffer = Buffer.alloc(0);
    this.discardingOverflow = false;

    if (discarding || remaining.length === 0) {
      return [];
    }

    const event = this.decodeBytes(remaining);
    return event ? [event] : [];
  }

  /**
   * Drops the partial packet after a connection loss. Session context is kept
   * so records on the new connection are still attributed; packets sent while
   * disconnected are not recovered.
   */
  reset(): number {
    const dropped = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    this.discardingOverflow = false;
    return dropped;
  }

  /** Decodes one complete packet without framing. */
  decodePacket(line: string): TimingEvent | null {
    const trimmed = line.replace(/\r$/, '').trim();
    if (trimmed.length === 0) {
      return null;
    }

    this.counters.packets += 1;

    let record = trimmed;
    const tagStart = trimmed.indexOf('$');
    if (tagStart > 0) {
      this.counters.malformed += 1;
      this.report('malformed', 'Bytes before the record tag were dropped.', trimmed.slice(0, tagStart));
      record = trimmed.slice(tagStart);
    }

    const result = this.decodeRecord(record);

    if (!result) {
      this.counters.ignored += 1;
      return null;
    }

    if ('issue' in result) {
      switch (result.issue) {
        case 'malformed':
          this.counters.malformed += 1;
          break;
        case 'unknown':
          this.counters.unknown += 1;
          break;
        case 'orphaned':
          this.counters.orphaned += 1;
          break;
      }
      this.report(result.issue, result.reason, record);
      return null;
    }

    this.counters.events += 1;
    return result.event;
  }

  private decodeBytes(packet: Buffer): TimingEvent | null {
    return this.decodePacket(packet.toString('utf8'));
  }

  private recordOverflow(packet: Buffer) {
    this.counters.overflowed += 1;
    this.report('overflow', `Packet exceeded ${this.maxPacketBytes} bytes.`, packet.toString('utf8'));
  }

  private report(kind: FeedIssueKind, reason: string, packet: string) {
    this.options.onIssue?.({ kind, reason, packet: packet.slice(0, 160) });
  }

  private decodeRecord(line: string): DecodeResult {
    if (!line.startsWith('$')) {
      return { issue: 'malformed', reason: 'Packet does not start with a record tag.' };
    }

    const fields = splitFeedRecord(line);
    if (!fields) {
      return { issue: 'malformed', reason: 'Quoted field is not terminated.' };
    }

    const [tag, ...args] = fields;

    switch (tag) {
      case '$B':
        return this.decodeRun(args);
      case '$A':
        return this.decodeCompetitor(args, { number: 1, transponder: 2, first: 3, last: 4 });
      case '$COMP':
        return this.decodeCompetitor(args, { number: 1, transponder: null, first: 3, last: 4 });
      case '$F':
        return this.decodeFlag(args);
      case '$G':
        return this.decodeRacePosition(args);
      case '$J':
        return this.decodePassing(args);
      default:
        if (IGNORED_TAGS.has(tag)) {
          return null;
        }
        return { issue: 'unknown', reason: `Unknown record tag ${tag}.` };
    }
  }

  private decodeRun(args: string[]): DecodeResult {
    const runNumber = field(args, 0);
    const description = field(args, 1);
    const sessionId = runNumber || description;

    if (!sessionId) {
      return { issue: 'malformed', reason: 'Run record has neither number nor description.' };
    }

    if (sessionId !== this.sessionId) {
      this.passings.clear();
      this.lastPassingElapsed.clear();
      this.pendingLapCounts.clear();
      this.sessionId = sessionId;
    }

    return {
      event: {
        kind: 'session_state_changed',
        sessionId,
        state: 'idle',
        sessionName: description || null,
        flag: null,
      },
    };
  }

  private decodeCompetitor(
    args: string[],
    layout: { number: number; transponder: number | null; first: number; last: number },
  ): DecodeResult {
    const competitorId = field(args, 0);
    if (!competitorId) {
      return { issue: 'malformed', reason: 'Competitor record without registration number.' };
    }

    if (!this.sessionId) {
      return { issue: 'orphaned', reason: 'Competitor record before any run record.' };
    }

    const carNumber = field(args, layout.number) || competitorId;
    const transponder = layout.transponder === null ? '' : field(args, layout.transponder);

    return {
      event: {
        kind: 'competitor_registered',
        sessionId: this.sessionId,
        competitorId,
        carNumber,
        transponder: transponder || null,
        displayName: buildCompetitorDisplayName(
          field(args, layout.first),
          field(args, layout.last),
          carNumber,
        ),
      },
    };
  }

  private decodeFlag(args: string[]): DecodeResult {
    const flag = field(args, 4);
    const state = flagToState(flag);
    if (!state) {
      return null;
    }

    if (!this.sessionId) {
      return { issue: 'orphaned', reason: 'Flag record before any run record.' };
    }

    return {
      event: {
        kind: 'session_state_changed',
        sessionId: this.sessionId,
        state,
        sessionName: null,
        flag,
      },
    };
  }

  private decodeRacePosition(args: string[]): DecodeResult {
    const position = parseFeedInteger(field(args, 0));
    const competitorId = field(args, 1);
    const lapsField = field(args, 2);
    const laps = lapsField ? parseFeedInteger(lapsField) : null;
    const elapsed = optionalTime(field(args, 3));

    if (position === null || position < 1 || !competitorId) {
      return { issue: 'malformed', reason: 'Race record needs a position and a registration number.' };
    }

    if (lapsField && laps === null) {
      return { issue: 'malformed', reason: `Race record lap count "${lapsField}" is not a number.` };
    }

    if (elapsed === 'invalid') {
      return { issue: 'malformed', reason: 'Race record time is not a valid time.' };
    }

    if (!this.sessionId) {
      return { issue: 'orphaned', reason: 'Race record before any run record.' };
    }

    if (laps !== null) {
      const counted = this.passings.get(competitorId) ?? 0;
      if (elapsed === null || elapsed === this.lastPassingElapsed.get(competitorId)) {
        this.passings.set(competitorId, Math.max(counted, laps));
      } else if (laps > counted) {
        this.pendingLapCounts.set(competitorId, { laps, elapsedMs: elapsed });
      }
    }

    return {
      event: {
        kind: 'position_changed',
        sessionId: this.sessionId,
        competitorId,
        position,
        lapsCompleted: laps,
        elapsedMs: elapsed,
      },
    };
  }

  private decodePassing(args: string[]): DecodeResult {
    const competitorId = field(args, 0);
    const lapTimeField = field(args, 1);
    const lapTimeMs = isBlankFeedTime(lapTimeField) ? null : parseFeedTime(lapTimeField);
    const elapsed = optionalTime(field(args, 2));

    if (!competitorId || lapTimeMs === null || lapTimeMs <= 0) {
      return { issue: 'malformed', reason: 'Passing record needs a registration number and lap time.' };
    }

    if (elapsed === 'invalid') {
      return { issue: 'malformed', reason: 'Passing record total time is not a valid time.' };
    }

    if (!this.sessionId) {
      return { issue: 'orphaned', reason: 'Passing record before any run record.' };
    }

    const counted = this.passings.get(competitorId) ?? 0;
    const pending = this.pendingLapCounts.get(competitorId);
    let lapNumber = counted + 1;
    if (pending) {
      lapNumber =
        pending.elapsedMs === elapsed
          ? Math.max(lapNumber, pending.laps)
          : Math.max(counted, pending.laps) + 1;
      this.pendingLapCounts.delete(competitorId);
    }
    this.passings.set(competitorId, lapNumber);
    this.lastPassingElapsed.set(competitorId, elapsed);

    return {
      event: {
        kind: 'lap_completed',
        sessionId: this.sessionId,
        competitorId,
        lapNumber,
        lapTimeMs,
        elapsedMs: elapsed,
      },
    };
  }
}
