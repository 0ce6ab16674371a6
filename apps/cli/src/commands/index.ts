/**
 * Ticketflow CLI Commands
 *
 * Explicit command registration for OCLIF
 */

import Ask from "./ask.js";
import MeetingProcess from "./meeting/process.js";
import TicketWork from "./ticket/work.js";

export const COMMANDS = {
  ask: Ask,
  "meeting:process": MeetingProcess,
  "ticket:work": TicketWork,
};
