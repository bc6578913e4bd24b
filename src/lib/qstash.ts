import { Client, Receiver } from "@upstash/qstash";
import { QSTASH_RETRIES } from "@/lib/constants";
import { toRecord } from "@/lib/execution/queue-manager";
import type { ExecutionMessage } from "@/lib/schemas";
import type { QueuedExecution } from "@/types";

// --- QStash Client ---

let qstashClient: Client | null = null;

function getQStash(): Client {
  if (qstashClient) return qstashClient;
  const token = process.env.QSTASH_TOKEN;
  if (!token) throw new Error("QSTASH_TOKEN not configured");
  qstashClient = new Client({ token });
  return qstashClient;
}

export function isQStashEnabled(): boolean {
  return !!process.env.QSTASH_TOKEN;
}

export function getReceiver(): Receiver {
  const currentKey = process.env.QSTASH_CURRENT_SIGNING_KEY;
  const nextKey = process.env.QSTASH_NEXT_SIGNING_KEY;
  if (!currentKey || !nextKey) {
    throw new Error("QSTASH_CURRENT_SIGNING_KEY and QSTASH_NEXT_SIGNING_KEY must be set");
  }
  return new Receiver({ currentSigningKey: currentKey, nextSigningKey: nextKey });
}

export function getExecutionDestination(): string {
  const baseUrl = process.env.SWEEP_BASE_URL || "http://localhost:3000";
  return `${baseUrl.replace(/\/$/, "")}/api/xyz/execute`;
}

// --- Job Publishing ---

/** Publishes one message per combination; workers pick them up in any order. */
export async function publishExecutions(
  executions: QueuedExecution[],
  destination = getExecutionDestination()
): Promise<void> {
  const qstash = getQStash();

  const publishes = executions.map((execution) => {
    const body: ExecutionMessage = { execution: toRecord(execution) };
    return qstash.publishJSON({
      url: destination,
      body,
      retries: QSTASH_RETRIES,
    });
  });

  await Promise.all(publishes);
  console.log(`[qstash] Published ${executions.length} executions to ${destination}`);
}
