import { Response, NextFunction } from 'express';
import { AppDeps, AuthRequest } from '../types/index.js';
import { Errors } from '../utils/AppError.js';
import type { ChatBody } from '../middleware/maintenanceValidation.js';
import { interpretMessage, type AssistantReply, type MaintenanceRequestReply } from '../utils/llmExtractor.js';
import { LLMUnavailableError } from '../utils/llmProvider.js';
import { planSchedule } from '../utils/maintenanceSchedule.js';
import { sanitizeText } from '../utils/sanitize.js';
import { toMonitoringError, type ZabbixApi, type ZabbixHost, type ZabbixHostGroup } from '../utils/zabbixClient.js';

/* ------------------------------------------------------------------ */
/*  Entity resolution                                                 */
/* ------------------------------------------------------------------ */

export interface ResolvedEntities {
  foundHosts: ZabbixHost[];
  foundGroups: ZabbixHostGroup[];
  missingHosts: string[];
  missingGroups: string[];
  hostsByTags: number;
}

/**
 * Exact-name lookup of the requested hosts and groups, plus hosts matching
 * the trigger tags.  Names with no exact match are reported as missing.
 */
export async function resolveEntities(
  zabbix: ZabbixApi,
  request: Pick<MaintenanceRequestReply, 'hosts' | 'groups' | 'trigger_tags'>,
): Promise<ResolvedEntities> {
  const [hosts, groups, tagged] = await Promise.all([
    zabbix.getHosts(request.hosts),
    zabbix.getHostGroups(request.groups),
    zabbix.getHostsByTags(request.trigger_tags),
  ]);

  const foundHostNames = new Set(hosts.map((h) => h.host));
  const foundGroupNames = new Set(groups.map((g) => g.name));

  // Deduplicate by id; name lookups first so they win over tag matches
  const uniqueHosts = new Map<string, ZabbixHost>();
  for (const h of [...hosts, ...tagged]) {
    if (!uniqueHosts.has(h.hostid)) uniqueHosts.set(h.hostid, h);
  }

  return {
    foundHosts: [...uniqueHosts.values()],
    foundGroups: groups,
    missingHosts: request.hosts.filter((name) => !foundHostNames.has(name)),
    missingGroups: request.groups.filter((name) => !foundGroupNames.has(name)),
    hostsByTags: tagged.length,
  };
}

function describeMissing(entities: ResolvedEntities): string {
  const missing: string[] = [];
  if (entities.missingHosts.length > 0) missing.push(`hosts: ${entities.missingHosts.join(', ')}`);
  if (entities.missingGroups.length > 0) missing.push(`groups: ${entities.missingGroups.join(', ')}`);

  let message = `I prepared your maintenance, but some resources were not found: ${missing.join('; ')}.\n\nFound resources:\n`;
  if (entities.foundHosts.length > 0) {
    message += `Hosts: ${entities.foundHosts.map((h) => h.name || h.host).join(', ')}\n`;
  }
  if (entities.foundGroups.length > 0) {
    message += `Groups: ${entities.foundGroups.map((g) => g.name).join(', ')}\n`;
  }
  return `${message}\nContinue with the resources found, or adjust the request?`;
}

const NOTHING_FOUND_MESSAGE =
  'I could not find any host or group with those names. Check the names as they appear in Zabbix, ' +
  'or use a host group instead of individual hosts.';

/* ------------------------------------------------------------------ */
/*  Controller                                                        */
/* ------------------------------------------------------------------ */

export const createChatController = ({ zabbix, llm }: AppDeps) => {
  /**
   * Interpret a chat message.
   * POST /api/chat
   */
  const chat = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: ChatBody = req.body;
      const message = sanitizeText(body.message);
      if (!message) {
        throw Errors.validation('Message must not be empty.');
      }

      let reply: AssistantReply;
      try {
        reply = await interpretMessage(llm, message);
      } catch (err) {
        if (err instanceof LLMUnavailableError) throw Errors.aiUnavailable();
        throw err;
      }

      if (reply.type !== 'maintenance_request') {
        res.json({ success: true, data: reply });
        return;
      }

      const plan = planSchedule({
        recurrenceType: reply.recurrence_type,
        recurrenceConfig: reply.recurrence_config,
        startTime: reply.start_time,
        endTime: reply.end_time,
        requireWindow: true,
      });

      if (!plan.ok) {
        res.json({
          success: true,
          data: {
            type: 'clarification_needed',
            message: plan.error.message,
            missing_info: [],
            reason: plan.error.code,
          },
        });
        return;
      }

      const entities = await resolveEntities(zabbix, reply);
      const hasMissing = entities.missingHosts.length > 0 || entities.missingGroups.length > 0;
      const nothingFound = entities.foundHosts.length === 0 && entities.foundGroups.length === 0;

      res.json({
        success: true,
        data: {
          ...reply,
          type: nothingFound ? 'clarification_needed' : reply.type,
          message: nothingFound
            ? NOTHING_FOUND_MESSAGE
            : hasMissing
              ? describeMissing(entities)
              : reply.message,
          schedule: { summary: plan.value.summary, details: plan.value.details },
          found_hosts: entities.foundHosts,
          found_groups: entities.foundGroups,
          missing_hosts: entities.missingHosts,
          missing_groups: entities.missingGroups,
          original_message: message,
          search_summary: {
            total_hosts_found: entities.foundHosts.length,
            total_groups_found: entities.foundGroups.length,
            hosts_by_tags: entities.hostsByTags,
            has_missing: hasMissing,
            is_routine: plan.value.kind !== 'once',
            has_ticket: Boolean(reply.ticket_number?.trim()),
          },
        },
      });
    } catch (error) {
      next(toMonitoringError(error));
    }
  };

  return { chat };
};
