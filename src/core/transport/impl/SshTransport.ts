/**
 * SSH transport
 *
 * One connection, one exec channel, one command. The connection is closed
 * on every exit path and nothing is pooled.
 */

import { createHash } from "node:crypto";
import ssh2, { type ConnectConfig } from "ssh2";
import {
  CommandError,
  ConnectionError,
  InvalidCredentialError,
  SessionError,
  errorMessage,
} from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import type { ITransport, SshCredentials, SshTransportOptions } from "../interfaces/ITransport.js";

const { Client, utils } = ssh2;

const logger = createLogger("transport");

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_READY_TIMEOUT_MS = 20_000;

/**
 * Parses the private key, throwing InvalidCredentialError when it is not a
 * usable key.
 */
export function assertPrivateKey(privateKey: string): void {
  let parsed: ReturnType<typeof utils.parseKey>;
  try {
    parsed = utils.parseKey(privateKey);
  } catch (error) {
    throw new InvalidCredentialError(`malformed private key: ${errorMessage(error)}`, { cause: error });
  }
  if (parsed instanceof Error) {
    throw new InvalidCredentialError(`malformed private key: ${parsed.message}`, { cause: parsed });
  }
}

function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/^SHA256:/, "").replace(/=+$/, "");
}

export function fingerprintOf(hostKey: Buffer): string {
  return createHash("sha256").update(hostKey).digest("base64").replace(/=+$/, "");
}

export class SshTransport implements ITransport {
  private readonly port: number;
  private readonly readyTimeoutMs: number;
  private readonly hostFingerprints: Readonly<Record<string, string>>;

  constructor(
    private readonly credentials: SshCredentials,
    options: SshTransportOptions = {}
  ) {
    this.port = options.port ?? DEFAULT_SSH_PORT;
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
    this.hostFingerprints = options.hostFingerprints ?? {};
  }

  async run(command: string, host: string): Promise<string> {
    assertPrivateKey(this.credentials.privateKey);

    logger.debug({ host, command }, "Running remote command");
    const output = await this.exec(command, host);
    logger.debug({ host, output }, "Remote command output");

    return output;
  }

  private exec(command: string, host: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const client = new Client();
      let connected = false;
      let settled = false;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        client.end();
        outcome();
      };

      client.on("ready", () => {
        connected = true;

        client.exec(command, (execError, stream) => {
          if (execError) {
            settle(() =>
              reject(
                new SessionError(
                  `cannot create session with the Salt Minion ${host}: ${execError.message}`,
                  { host, command },
                  { cause: execError }
                )
              )
            );
            return;
          }

          const stdout: Buffer[] = [];
          const stderr: Buffer[] = [];
          let exitCode: number | null = null;

          stream.on("data", (chunk: Buffer) => stdout.push(chunk));
          stream.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
          stream.on("exit", (code: number | null) => {
            exitCode = code;
          });
          stream.on("error", (streamError: Error) => {
            settle(() =>
              reject(
                new CommandError(
                  `cannot run the command ${command} on Salt Minion ${host}: ${streamError.message}`,
                  { host, command, output: Buffer.concat(stdout).toString("utf8") },
                  { cause: streamError }
                )
              )
            );
          });
          stream.on("close", () => {
            const out = Buffer.concat(stdout).toString("utf8");
            if (exitCode === 0) {
              settle(() => resolve(out));
              return;
            }
            const err = Buffer.concat(stderr).toString("utf8");
            const status = exitCode === null ? "no exit status" : `exit status ${exitCode}`;
            settle(() =>
              reject(
                new CommandError(`cannot run the command ${command} on Salt Minion ${host}: ${status}`, {
                  host,
                  command,
                  exitCode: exitCode ?? undefined,
                  output: out,
                  stderr: err,
                })
              )
            );
          });
        });
      });

      client.on("error", (clientError: Error) => {
        settle(() =>
          reject(
            connected
              ? new CommandError(
                  `cannot run the command ${command} on Salt Minion ${host}: ${clientError.message}`,
                  { host, command },
                  { cause: clientError }
                )
              : new ConnectionError(
                  `cannot connect to the Salt Minion ${host}: ${clientError.message}`,
                  { host, command },
                  { cause: clientError }
                )
          )
        );
      });

      client.on("close", () => {
        settle(() =>
          reject(
            new ConnectionError(`connection to the Salt Minion ${host} closed unexpectedly`, { host, command })
          )
        );
      });

      try {
        client.connect(this.connectConfig(host));
      } catch (connectError) {
        settle(() =>
          reject(
            new ConnectionError(
              `cannot connect to the Salt Minion ${host}: ${errorMessage(connectError)}`,
              { host, command },
              { cause: connectError }
            )
          )
        );
      }
    });
  }

  private connectConfig(host: string): ConnectConfig {
    const expected = this.hostFingerprints[host];

    return {
      host,
      port: this.port,
      username: this.credentials.username,
      privateKey: this.credentials.privateKey,
      readyTimeout: this.readyTimeoutMs,
      // Hosts without a pinned fingerprint are trusted as-is
      hostVerifier: (hostKey: Buffer): boolean =>
        expected === undefined || fingerprintOf(hostKey) === normalizeFingerprint(expected),
    };
  }
}
