import { readFile } from 'node:fs/promises';
import { Response, NextFunction } from 'express';
import { AppDeps, AuthRequest } from '../types/index.js';
import { Errors } from '../utils/AppError.js';
import { formatLocalDateTime } from '../utils/date.js';
import type { CreateMaintenanceBody, PreviewBody } from '../middleware/maintenanceValidation.js';
import { logger } from '../middleware/requestLogger.js';
import { planSchedule, toScheduleAppError, type PlannedSchedule } from '../utils/maintenanceSchedule.js';
import { generateMaintenanceDescription, generateMaintenanceName, requesterName } from '../utils/maintenanceNaming.js';
import { decode, describeSchedule } from '../utils/recurrenceCodec.js';
import { sanitizeText } from '../utils/sanitize.js';
import { toMonitoringError, type ZabbixMaintenance } from '../utils/zabbixClient.js';

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

/** Resolved from the project root so it works from src/ and dist/. */
const EXAMPLES_FILE = new URL('../../data/requestExamples.json', import.meta.url);

let examplesCache: unknown;

const loadExamples = async (): Promise<unknown> => {
  if (examplesCache === undefined) {
    examplesCache = JSON.parse(await readFile(EXAMPLES_FILE, 'utf8'));
  }
  return examplesCache;
};

function successMessage(
  plan: PlannedSchedule,
  fields: { name: string; start: string; end: string; hosts: number; groups: number; ticket?: string; requester?: string },
): string {
  const lines = [
    'Maintenance created.',
    '',
    `Name: ${fields.name}`,
    `Start: ${fields.start}`,
    `End: ${fields.end}`,
    `Hosts affected: ${fields.hosts}`,
    `Groups affected: ${fields.groups}`,
  ];
  if (plan.kind !== 'once') {
    lines.push(`Routine: ${plan.kind}`, ...plan.details.slice(1));
  }
  if (fields.ticket) lines.push(`Ticket: ${fields.ticket}`);
  if (fields.requester) lines.push(`Requested by: ${fields.requester}`);
  return lines.join('\n');
}

function toListItem(m: ZabbixMaintenance) {
  const schedules = m.timeperiods.map((tp) => decode(tp));
  const first = schedules[0];
  const routineType = first && first.kind !== 'unknown' ? first.kind : 'once';

  return {
    maintenanceid: m.maintenanceid,
    name: m.name,
    description: m.description,
    active_since: formatLocalDateTime(m.active_since),
    active_till: formatLocalDateTime(m.active_till),
    hosts: m.hosts,
    groups: m.hostgroups,
    tags: m.tags,
    is_routine: routineType !== 'once',
    routine_type: routineType,
    schedules: schedules.map((summary) => ({ summary, details: describeSchedule(summary) })),
  };
}

/* ------------------------------------------------------------------ */
/*  Controller                                                        */
/* ------------------------------------------------------------------ */

export const createMaintenanceController = ({ zabbix }: AppDeps) => {
  /**
   * Create a maintenance period.
   * POST /api/maintenance
   */
  const createMaintenance = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: CreateMaintenanceBody = req.body;

      const plan = planSchedule({
        recurrenceType: body.recurrence_type,
        recurrenceConfig: body.recurrence_config,
        startTime: body.start_time,
        endTime: body.end_time,
        requireWindow: true,
      });
      if (!plan.ok) throw toScheduleAppError(plan.error);

      const { window } = plan.value;
      if (!window) throw Errors.validation('A start and end time are required.');

      const [hosts, groups] = await Promise.all([
        zabbix.getHosts(body.hosts),
        zabbix.getHostGroups(body.groups),
      ]);
      if (hosts.length === 0 && groups.length === 0) {
        throw Errors.notFound('No valid hosts or host groups were found.');
      }

      const ticket = sanitizeText(body.ticket_number);
      const name = generateMaintenanceName({
        recurrenceKind: plan.value.kind,
        ticketNumber: ticket,
        hostNames: hosts.map((h) => h.name || h.host),
        groupNames: groups.map((g) => g.name),
      });
      const description = generateMaintenanceDescription({
        description: body.description,
        ticketNumber: ticket,
        user: req.user,
      });

      const maintenanceId = await zabbix.createMaintenance({
        name,
        description,
        activeSince: window.startTime,
        activeTill: window.endTime,
        hostIds: hosts.map((h) => h.hostid),
        groupIds: groups.map((g) => g.groupid),
        tags: body.trigger_tags,
        timeperiods: [plan.value.timeperiod],
      });

      logger.info({
        type: 'maintenance_created',
        maintenanceId,
        kind: plan.value.kind,
        userId: req.user?.userid,
      });

      res.status(201).json({
        success: true,
        data: {
          maintenance_id: maintenanceId,
          name,
          description,
          start_time: body.start_time,
          end_time: body.end_time,
          recurrence_type: plan.value.kind,
          is_routine: plan.value.kind !== 'once',
          hosts_affected: hosts.length,
          groups_affected: groups.length,
          ticket_number: ticket,
          timeperiod: plan.value.timeperiod,
          schedule: { summary: plan.value.summary, details: plan.value.details },
          message: successMessage(plan.value, {
            name,
            start: body.start_time,
            end: body.end_time,
            hosts: hosts.length,
            groups: groups.length,
            ticket,
            requester: req.user ? requesterName(req.user) : undefined,
          }),
        },
      });
    } catch (error) {
      next(toMonitoringError(error));
    }
  };

  /**
   * Most recent maintenance periods with their decoded schedules.
   * GET /api/maintenance?limit=50
   */
  const listMaintenances = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const limit = Number(req.query.limit) || 50;
      const maintenances = (await zabbix.listMaintenances(limit)).map(toListItem);
      res.json({ success: true, data: { maintenances, total: maintenances.length } });
    } catch (error) {
      next(toMonitoringError(error));
    }
  };

  /**
   * Validate and encode a schedule without creating anything.
   * POST /api/maintenance/preview
   */
  const previewSchedule = (req: AuthRequest, res: Response, next: NextFunction): void => {
    try {
      const body: PreviewBody = req.body;
      const plan = planSchedule({
        recurrenceType: body.recurrence_type,
        recurrenceConfig: body.recurrence_config,
        startTime: body.start_time,
        endTime: body.end_time,
        requireWindow: false,
      });
      if (!plan.ok) throw toScheduleAppError(plan.error);

      res.json({
        success: true,
        data: {
          valid: true,
          recurrence_type: plan.value.kind,
          timeperiod: plan.value.timeperiod,
          summary: plan.value.summary,
          details: plan.value.details,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Example requests and routine templates for the widget.
   * GET /api/maintenance/examples
   */
  const getExamples = async (_req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json({ success: true, data: await loadExamples() });
    } catch (error) {
      next(error);
    }
  };

  return { createMaintenance, listMaintenances, previewSchedule, getExamples };
};
