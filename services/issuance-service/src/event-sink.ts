import type { FastifyBaseLogger } from "fastify";
import {
  buildServiceAuthHeaders,
  type EventPublishStatus,
  type PublishEventsRequest,
  type RecordedEvent,
} from "@holderpass/shared";

/**
 * Forwards committed events to an indexer. Events are already in the local
 * log, so a failed delivery is logged and reported but never undoes anything.
 */
export async function tryPublishEvents(
  sinkUrl: string | undefined,
  events: RecordedEvent[],
  serviceAuthToken: string | undefined,
  log: FastifyBaseLogger,
): Promise<EventPublishStatus> {
  if (!sinkUrl || events.length === 0) {
    return "SKIPPED";
  }

  const body: PublishEventsRequest = { events };
  const sequences = events.map((recorded) => recorded.sequence);
  try {
    const response = await fetch(`${sinkUrl.replace(/\/$/, "")}/events/ingest`, {
      method: "POST",
      headers: {
        ...buildServiceAuthHeaders(serviceAuthToken),
        "content-type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(3000),
    });
    if (!response.ok) {
      log.warn({ statusCode: response.status, sequences }, "event sink rejected events");
      return "FAILED";
    }
    return "PUBLISHED";
  } catch (error) {
    log.warn({ err: error, sequences }, "event sink unreachable");
    return "FAILED";
  }
}
