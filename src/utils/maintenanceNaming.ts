import type { ZabbixUserInfo } from '../types/index.js';
import { sanitizeText } from './sanitize.js';

/** Zabbix rejects maintenance names longer than this. */
export const MAX_NAME_LENGTH = 128;

const DEFAULT_DESCRIPTION = 'Maintenance created via AI assistant';

export interface NamingInput {
  recurrenceKind: string;
  ticketNumber?: string;
  hostNames: string[];
  groupNames: string[];
}

export interface DescriptionInput {
  description?: string;
  ticketNumber?: string;
  user?: ZabbixUserInfo;
}

const listWithOverflow = (items: string[], shown: number, noun: string): string => {
  const head = items.slice(0, shown).join(', ');
  const rest = items.length - shown;
  return rest > 0 ? `${head} and ${rest} more ${noun}` : head;
};

/**
 * "AI Maintenance: <ticket>" when a ticket is known, otherwise the first
 * few host and group names.  Recurring maintenance is marked "(routine)".
 */
export function generateMaintenanceName(input: NamingInput): string {
  const prefix = input.recurrenceKind === 'once' ? 'AI Maintenance' : 'AI Maintenance (routine)';
  const ticket = sanitizeText(input.ticketNumber);

  let subject: string;
  if (ticket) {
    subject = ticket;
  } else {
    const parts: string[] = [];
    if (input.hostNames.length > 0) {
      parts.push(listWithOverflow(input.hostNames, 3, 'hosts'));
    }
    if (input.groupNames.length > 0) {
      parts.push(listWithOverflow(input.groupNames.map((g) => `Group ${g}`), 2, 'groups'));
    }
    subject = parts.join(', ') || 'Various resources';
  }

  return `${prefix}: ${subject}`.slice(0, MAX_NAME_LENGTH);
}

export function requesterName(user: ZabbixUserInfo): string {
  const fullName = [user.name, user.surname].filter(Boolean).join(' ').trim();
  return fullName || user.username || `user ${user.userid}`;
}

/** Base text, then one line each for the ticket and the requester. */
export function generateMaintenanceDescription(input: DescriptionInput): string {
  const lines = [sanitizeText(input.description) || DEFAULT_DESCRIPTION];

  const ticket = sanitizeText(input.ticketNumber);
  if (ticket) lines.push(`Ticket: ${ticket}`);
  if (input.user) lines.push(`Requested by: ${sanitizeText(requesterName(input.user))}`);

  return lines.join('\n');
}
