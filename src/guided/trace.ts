/**
 * Append-only research trace.
 *
 * Records what happened in a session (starts, validations, rejections and
 * completion) as JSON lines beside the session document. The session document
 * stays the source of truth; the trace is an audit log.
 *
 * @packageDocumentation
 */

import {
  isErrnoCode,
  resolveWithin,
  safeAppendFile,
  safeMkdir,
  safeReadFile,
} from '../utils/safe-fs.js';

/**
 * Kinds of trace events.
 */
export type TraceEventType =
  | 'session_started'
  | 'step_validated'
  | 'step_rejected'
  | 'session_completed';

/**
 * A single trace entry.
 */
export interface TraceEntry {
  readonly timestamp: string;
  readonly sessionId: string;
  readonly event: TraceEventType;
  readonly step: number;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Destination for trace entries.
 */
export interface ResearchTrace {
  append(entry: TraceEntry): Promise<void>;
}

/**
 * Error raised for unreadable trace files.
 */
export class TraceReadError extends Error {
  public readonly lineNumber: number;

  constructor(message: string, lineNumber: number) {
    super(message);
    this.name = 'TraceReadError';
    this.lineNumber = lineNumber;
  }
}

const TRACE_EVENTS: readonly TraceEventType[] = [
  'session_started',
  'step_validated',
  'step_rejected',
  'session_completed',
];

/**
 * Serializes an entry to one JSON line, without the trailing newline.
 */
export function serializeTraceEntry(entry: TraceEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp,
    session_id: entry.sessionId,
    event: entry.event,
    step: entry.step,
    data: entry.data,
  });
}

/**
 * Parses one JSONL line.
 *
 * @throws TraceReadError if the line is not a trace entry.
 */
export function deserializeTraceEntry(line: string, lineNumber: number): TraceEntry {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TraceReadError(
      `Failed to parse trace entry at line ${String(lineNumber)}: ${reason}`,
      lineNumber
    );
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new TraceReadError(`Invalid trace entry at line ${String(lineNumber)}`, lineNumber);
  }

  const { timestamp, session_id: sessionId, event, step, data: payload } = data as Record<
    string,
    unknown
  >;
  const eventType = TRACE_EVENTS.find((e) => e === event);

  if (
    typeof timestamp !== 'string' ||
    typeof sessionId !== 'string' ||
    eventType === undefined ||
    typeof step !== 'number' ||
    typeof payload !== 'object' ||
    payload === null ||
    Array.isArray(payload)
  ) {
    throw new TraceReadError(`Invalid trace entry at line ${String(lineNumber)}`, lineNumber);
  }

  return { timestamp, sessionId, event: eventType, step, data: { ...payload } };
}

/**
 * Writes `<sessionId>.trace.jsonl` files into a directory.
 */
export class FileResearchTrace implements ResearchTrace {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  tracePath(sessionId: string): string {
    return resolveWithin(this.directory, `${sessionId}.trace.jsonl`);
  }

  async append(entry: TraceEntry): Promise<void> {
    const filePath = this.tracePath(entry.sessionId);
    await safeMkdir(this.directory);
    await safeAppendFile(filePath, serializeTraceEntry(entry) + '\n');
  }

  /**
   * Reads every entry of a session's trace. A missing file is an empty trace.
   */
  async read(sessionId: string): Promise<TraceEntry[]> {
    let content: string;
    try {
      content = await safeReadFile(this.tracePath(sessionId));
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    return content
      .split('\n')
      .map((line, index) => ({ line, lineNumber: index + 1 }))
      .filter(({ line }) => line.trim() !== '')
      .map(({ line, lineNumber }) => deserializeTraceEntry(line, lineNumber));
  }
}

/**
 * Collects entries in memory.
 */
export class MemoryResearchTrace implements ResearchTrace {
  readonly entries: TraceEntry[] = [];

  append(entry: TraceEntry): Promise<void> {
    this.entries.push(entry);
    return Promise.resolve();
  }
}
