import type { BatchLandedNotice, DownstreamTrigger } from "../../ports/DownstreamTrigger";
import { NotifyError } from "../../core/ingestion/errors";

/**
 * Signals the transformation job runner with a single POST. Queueing and
 * redelivery are the runner's concern, so there is no retry here.
 */
export class HttpDownstreamTrigger implements DownstreamTrigger {
  constructor(
    private readonly url: string,
    private readonly token?: string,
    private readonly timeoutMs = 8000
  ) {}

  async notify(notice: BatchLandedNotice): Promise<void> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify(notice),
        signal: controller.signal
      });
    } catch (err) {
      const reason = controller.signal.aborted ? `timeout after ${this.timeoutMs}ms` : "network failure";
      throw new NotifyError(`Downstream trigger ${reason}`, { requestUrl: this.url, cause: err });
    } finally {
      clearTimeout(timeout);
    }

    await res.text().catch(() => "");
    if (!res.ok) {
      throw new NotifyError(`Downstream trigger failed: ${res.status}`, { status: res.status, requestUrl: this.url });
    }
  }
}

export class NoopDownstreamTrigger implements DownstreamTrigger {
  async notify(notice: BatchLandedNotice): Promise<void> {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({
      event: "notify.skipped",
      reason: "no downstream trigger configured",
      batchUri: notice.batchUri,
      invocationId: notice.invocationId
    }));
  }
}
