/**
 * Uyuni API client
 *
 * Two calls per check: `POST /auth/login` for a session cookie, then
 * `GET /saltkey/acceptedList` with that cookie.
 */

import { Agent, fetch, type Dispatcher, type RequestInit, type Response } from "undici";
import { z } from "zod";
import { InventoryError, errorMessage } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import type {
  IInventoryClient,
  InventoryClientOptions,
  InventoryCredentials,
} from "../interfaces/IInventory.js";

const logger = createLogger("inventory");

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const AcceptedListResponseSchema = z.object({
  success: z.boolean(),
  result: z.array(z.string()).nullish(),
});

export type AcceptedListResponse = z.infer<typeof AcceptedListResponseSchema>;

/**
 * Turns `set-cookie` headers into a `Cookie` request header value.
 */
export function sessionCookie(setCookies: readonly string[]): string {
  return setCookies
    .map((cookie) => cookie.split(";")[0]?.trim() ?? "")
    .filter((pair) => pair.length > 0)
    .join("; ");
}

export class InventoryClient implements IInventoryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;

  constructor(
    private readonly credentials: InventoryCredentials,
    options: InventoryClientOptions = {}
  ) {
    this.baseUrl = credentials.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.dispatcher =
      options.dispatcher ??
      new Agent({ connect: { rejectUnauthorized: options.verifyTls ?? false } });
  }

  async isAccepted(host: string): Promise<boolean> {
    const accepted = await this.acceptedHosts();
    return accepted.includes(host);
  }

  async acceptedHosts(): Promise<string[]> {
    const cookie = await this.login();

    const response = await this.send("acceptedList", "/saltkey/acceptedList", {
      method: "GET",
      headers: {
        "Content-Type": "application/json",
        ...(cookie ? { Cookie: cookie } : {}),
      },
    });

    if (!response.ok) {
      const body = await response.text();
      throw new InventoryError(`failed to fetch acceptedList: ${body}`, { status: response.status });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InventoryError(`failed to parse acceptedList response: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    const parsed = AcceptedListResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InventoryError(`failed to parse acceptedList response: ${parsed.error.message}`);
    }

    const hosts = parsed.data.result ?? [];
    logger.debug({ count: hosts.length, success: parsed.data.success }, "Fetched accepted salt keys");
    return hosts;
  }

  /**
   * Returns the session cookie established by the login call.
   */
  private async login(): Promise<string> {
    const response = await this.send("login", "/auth/login", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        login: this.credentials.username,
        password: this.credentials.password,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new InventoryError(`login failed: ${body}`, { status: response.status });
    }

    // Body is unused; drain it
    await response.arrayBuffer();
    return sessionCookie(response.headers.getSetCookie());
  }

  private async send(label: string, path: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        ...init,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
      throw new InventoryError(`${label} request failed: ${errorMessage(error)}${cause}`, undefined, {
        cause: error,
      });
    }
  }
}
