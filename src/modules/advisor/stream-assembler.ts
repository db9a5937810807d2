import { errorMessage, logError, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { PROGRAM_SECTION_MARKER } from "../../prompts/index.js";
import { isGenerationNode } from "./graph.js";
import type { GraphEvent, ResponseType, StateUpdate, StreamEvent, TurnSummary } from "./types.js";

export const STREAM_INTERRUPTED = "Stream interrupted";
export const SAFE_STREAM_ERROR_MESSAGE = "The response could not be completed. Please try again.";

const SCHOOL_LOGO_PATTERN = /school logo\s*:\s*(https?:\/\/\S+)/i;
const PROGRAM_LINK_PATTERN = /program link\s*:\s*(https?:\/\/\S+)/i;

type SplitterPhase = "preamble" | "in_section";

/** Length of the longest suffix of `text` that is a proper prefix of `marker`. */
const partialMarkerLength = (text: string, marker: string): number => {
  for (let length = Math.min(text.length, marker.length - 1); length > 0; length -= 1) {
    if (text.endsWith(marker.slice(0, length))) {
      return length;
    }
  }
  return 0;
};

const toLineEvent = (line: string): StreamEvent => {
  const logo = SCHOOL_LOGO_PATTERN.exec(line);
  if (logo) {
    return { type: "school_logo", url: logo[1] };
  }
  const link = PROGRAM_LINK_PATTERN.exec(line);
  if (link) {
    return { type: "program_link", url: link[1] };
  }
  return { type: "text_delta", text: line };
};

/**
 * Splits grounded-generation output into a preamble, passed through as it
 * arrives, and a program section that is released one line at a time so
 * logo and link lines can be turned into side-channel events. The marker is
 * forwarded on a line of its own so clients can tell the two parts apart.
 */
export class ProgramSectionSplitter {
  private phase: SplitterPhase = "preamble";

  private buffer = "";

  constructor(private readonly marker: string = PROGRAM_SECTION_MARKER) {}

  push(token: string): StreamEvent[] {
    this.buffer += token;
    return this.phase === "preamble" ? this.drainPreamble() : this.drainLines();
  }

  flush(): StreamEvent[] {
    const rest = this.buffer;
    this.buffer = "";
    if (rest.length === 0) {
      return [];
    }
    if (this.phase === "preamble") {
      return [{ type: "text_delta", text: rest }];
    }
    return [toLineEvent(rest)];
  }

  private drainPreamble(): StreamEvent[] {
    const index = this.buffer.indexOf(this.marker);
    if (index === -1) {
      const held = partialMarkerLength(this.buffer, this.marker);
      const text = this.buffer.slice(0, this.buffer.length - held);
      this.buffer = this.buffer.slice(this.buffer.length - held);
      return text.length > 0 ? [{ type: "text_delta", text }] : [];
    }

    const preamble = this.buffer.slice(0, index);
    this.buffer = this.buffer.slice(index + this.marker.length);
    this.phase = "in_section";
    const events: StreamEvent[] = preamble.length > 0 ? [{ type: "text_delta", text: preamble }] : [];
    events.push({ type: "text_delta", text: `${this.marker}\n` });
    return [...events, ...this.drainLines()];
  }

  private drainLines(): StreamEvent[] {
    const events: StreamEvent[] = [];
    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline + 1);
      this.buffer = this.buffer.slice(newline + 1);
      events.push(toLineEvent(line));
      newline = this.buffer.indexOf("\n");
    }
    return events;
  }
}

/**
 * End-of-turn values the caller persists. Filled while the stream is consumed.
 */
export class TurnBookkeeping {
  rewrittenQuery: string | null = null;

  responseType: ResponseType | null = null;

  completed = false;

  private readonly excludedIds: string[];

  constructor(initialExcludedIds: readonly string[] = []) {
    this.excludedIds = [...new Set(initialExcludedIds)];
  }

  recordUpdate(update: StateUpdate): void {
    if (update.rewritten_query !== undefined) {
      this.rewrittenQuery = update.rewritten_query;
    }
    for (const id of update.new_excluded_ids ?? []) {
      if (!this.excludedIds.includes(id)) {
        this.excludedIds.push(id);
      }
    }
  }

  toSummary(runId: string | null): TurnSummary {
    return {
      completed: this.completed,
      run_id: runId,
      rewritten_query: this.rewrittenQuery,
      excluded_ids: [...this.excludedIds],
      response_type: this.responseType ?? "text"
    };
  }
}

export interface AssemblerContext {
  runId: string | null;
  bookkeeping: TurnBookkeeping;
  log?: CorrelationContext;
  logError?: typeof logError;
  recordErrorRate?: typeof recordErrorRate;
}

/**
 * Turns raw graph events into the client event stream. Only generation-node
 * tokens reach the client; the first one is preceded by the `response_type`
 * metadata. The stream always ends with `done`, after the final metadata on
 * success or after an `error` event on failure.
 */
export async function* assembleResponseStream(
  events: AsyncIterable<GraphEvent>,
  context: AssemblerContext
): AsyncGenerator<StreamEvent, void, void> {
  const { bookkeeping } = context;
  let splitter: ProgramSectionSplitter | null = null;
  let contentYielded = false;

  try {
    for await (const event of events) {
      if (event.type === "node_end") {
        bookkeeping.recordUpdate(event.update);
        continue;
      }
      if (event.type !== "token" || !isGenerationNode(event.node) || event.token.length === 0) {
        continue;
      }

      if (bookkeeping.responseType === null) {
        const responseType: ResponseType = event.node === "generate_grounded" ? "programs" : "text";
        bookkeeping.responseType = responseType;
        splitter = responseType === "programs" ? new ProgramSectionSplitter() : null;
        yield { type: "metadata", metadata: { response_type: responseType } };
      }

      contentYielded = true;
      if (splitter) {
        yield* splitter.push(event.token);
      } else {
        yield { type: "text_delta", text: event.token };
      }
    }

    if (splitter) {
      yield* splitter.flush();
    }

    bookkeeping.completed = contentYielded;
    yield {
      type: "metadata",
      metadata: { run_id: context.runId, rewritten_query: bookkeeping.rewrittenQuery }
    };
  } catch (error) {
    (context.recordErrorRate ?? recordErrorRate)("advisor.stream");
    (context.logError ?? logError)("advisor.stream.failed", context.log ?? { runId: context.runId }, {
      error: errorMessage(error),
      error_name: error instanceof Error ? error.name : null
    });
    yield { type: "error", error: STREAM_INTERRUPTED, message: SAFE_STREAM_ERROR_MESSAGE, run_id: context.runId };
  }

  yield { type: "done" };
}
