/**
 * Domain types: Core → Edit / Plugin command hierarchy.
 *
 * CoreNotification / CoreRequest   Top-level unions, tagged by `method`.
 * ViewCommand<T>                   An edit command routed to one view.
 * EditNotification / EditRequest   Per-view sub-grammars, tagged by `method`.
 * PluginNotification               Plugin control, tagged by `command`.
 *
 * Every variant whose wire form carries `params` has a `params` field here;
 * variants without a payload have none.
 */

import type { RpcResponse, RpcType } from "./protocol.js";

// ─── Identifiers ─────────────────────────────────────────────────────────────

/** Names a client view. Opaque: only equality matters to routing. */
export type ViewIdentifier = string;

// ─── Positional payloads ─────────────────────────────────────────────────────

export interface LineRange {
  start: number;
  end: number;
}

export interface MouseAction {
  line: number;
  column: number;
  flags: number;
  /** Unset for a plain press; 2 for a double click, and so on. */
  click_count?: number;
}

export type GestureType = "toggle_sel";

// ─── Edit commands ───────────────────────────────────────────────────────────

export const EDIT_NOTIFICATION_UNIT_METHODS = [
  "delete_forward",
  "delete_backward",
  "delete_word_forward",
  "delete_word_backward",
  "delete_to_end_of_paragraph",
  "delete_to_beginning_of_line",
  "insert_newline",
  "insert_tab",
  "move_up",
  "move_up_and_modify_selection",
  "move_down",
  "move_down_and_modify_selection",
  "move_left",
  "move_left_and_modify_selection",
  "move_right",
  "move_right_and_modify_selection",
  "move_word_left",
  "move_word_left_and_modify_selection",
  "move_word_right",
  "move_word_right_and_modify_selection",
  "move_to_beginning_of_paragraph",
  "move_to_end_of_paragraph",
  "move_to_left_end_of_line",
  "move_to_left_end_of_line_and_modify_selection",
  "move_to_right_end_of_line",
  "move_to_right_end_of_line_and_modify_selection",
  "move_to_beginning_of_document",
  "move_to_beginning_of_document_and_modify_selection",
  "move_to_end_of_document",
  "move_to_end_of_document_and_modify_selection",
  "scroll_page_up",
  "page_up_and_modify_selection",
  "scroll_page_down",
  "page_down_and_modify_selection",
  "select_all",
  "add_selection_above",
  "add_selection_below",
  "yank",
  "transpose",
  "undo",
  "redo",
  "debug_rewrap",
  "debug_print_spans",
] as const;

export type EditNotificationUnitMethod = (typeof EDIT_NOTIFICATION_UNIT_METHODS)[number];

export type EditNotification =
  | { method: EditNotificationUnitMethod }
  | { method: "insert";        params: { chars: string } }
  | { method: "scroll";        params: LineRange }
  | { method: "goto_line";     params: { line: number } }
  | { method: "request_lines"; params: LineRange }
  | { method: "click";         params: MouseAction }
  | { method: "drag";          params: MouseAction }
  | { method: "gesture";       params: { line: number; column: number; ty: GestureType } }
  | { method: "find_next";     params: { wrap_around: boolean; allow_same: boolean } }
  | { method: "find_previous"; params: { wrap_around: boolean } };

export const EDIT_REQUEST_UNIT_METHODS = ["cut", "copy"] as const;

export type EditRequestUnitMethod = (typeof EDIT_REQUEST_UNIT_METHODS)[number];

export type EditRequest =
  | { method: EditRequestUnitMethod }
  | { method: "find"; params: { chars?: string; case_sensitive: boolean } };

/**
 * An inner command routed to one view. On the wire `view_id` sits beside the
 * inner command's `method` and `params` rather than wrapping them.
 */
export interface ViewCommand<T> {
  view_id: ViewIdentifier;
  cmd: T;
}

// ─── Plugin commands ─────────────────────────────────────────────────────────

/**
 * A generic RPC whose shape the core does not know, such as a custom plugin
 * command. The payload is kept as parsed.
 */
export interface PlaceholderRpc {
  method: string;
  params: unknown;
  rpc_type: RpcType;
}

export type PluginNotification =
  | { command: "start";      view_id: ViewIdentifier; plugin_name: string }
  | { command: "stop";       view_id: ViewIdentifier; plugin_name: string }
  | { command: "plugin_rpc"; view_id: ViewIdentifier; receiver: string; rpc: PlaceholderRpc };

// ─── Core commands ───────────────────────────────────────────────────────────

export type CoreNotification =
  | { method: "edit";           params: ViewCommand<EditNotification> }
  | { method: "plugin";         params: PluginNotification }
  | { method: "close_view";     params: { view_id: ViewIdentifier } }
  | { method: "save";           params: { view_id: ViewIdentifier; file_path: string } }
  | { method: "set_theme";      params: { theme_name: string } }
  | { method: "client_started" };

export type CoreRequest =
  | { method: "edit";     params: ViewCommand<EditRequest> }
  | { method: "new_view"; params: { file_path?: string } };

/** What the engine entry point produces: either side of the grammar. */
export type CoreCommand =
  | { rpc_type: "notification"; notification: CoreNotification }
  | { rpc_type: "request";      request: CoreRequest };

/** A decoded line. Requests keep their id for the reply. */
export type CoreMessage =
  | { rpc_type: "notification"; notification: CoreNotification }
  | { rpc_type: "request";      id: unknown; request: CoreRequest };

// ─── Connection State ─────────────────────────────────────────────────────────

export interface ConnectionState {
  /** Used as the correlation id in log records. */
  id: string;
  /** send a message to the connected client */
  send: (msg: RpcResponse) => void;
}
