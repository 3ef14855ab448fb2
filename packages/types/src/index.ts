/**
 * @termfocus/shared-types
 *
 * Types shared between the session runtime and the layers that consume it
 * (UI, input routing, diagnostics).
 */

// Sessions
export * from "./session/session.js";

// Focus routing
export * from "./focus/focus-events.js";

// Transport boundary
export * from "./transport/connection.js";
