/**
 * The seam between the decoder and whatever executes commands.
 *
 * The text engine itself lives outside this package; `InspectorEngine` is the
 * stand-in the CLI runs with. It records nothing about views or buffers, it
 * only reports what was decoded.
 */

import { encodeCoreNotification, encodeCoreRequest } from "./core.js";
import type { Logger } from "./logger.js";
import type { CoreNotification, CoreRequest } from "./types.js";

export interface Engine {
  notify(cmd: CoreNotification, connId: string): void;
  /** The value (awaited if it is a promise) becomes the `result` of the response. */
  request(cmd: CoreRequest, connId: string): unknown;
}

/** Logs each notification and answers requests with their canonical form. */
export class InspectorEngine implements Engine {
  constructor(private readonly logger: Logger) {}

  notify(cmd: CoreNotification, connId: string): void {
    this.logger.debug(`notification ${describe(cmd)}`, connId, { command: encodeCoreNotification(cmd) });
  }

  request(cmd: CoreRequest, connId: string): unknown {
    const canonical = encodeCoreRequest(cmd);
    this.logger.debug(`request ${describe(cmd)}`, connId, { command: canonical });
    return { accepted: canonical };
  }
}

/** `edit/insert@view-1`, `set_theme`, `plugin/start`. */
export function describe(cmd: CoreNotification | CoreRequest): string {
  switch (cmd.method) {
    case "edit":
      return `edit/${cmd.params.cmd.method}@${cmd.params.view_id}`;
    case "plugin":
      return `plugin/${cmd.params.command}`;
    default:
      return cmd.method;
  }
}
