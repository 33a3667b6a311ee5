/**
 * @concord/access-control — Role grants and ownership.
 *
 * @packageDocumentation
 */

export { AccessControlLedger } from "./access-control.js";
