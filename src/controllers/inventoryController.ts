import { Response, NextFunction } from 'express';
import { AppDeps, AuthRequest } from '../types/index.js';
import type { SearchBody } from '../middleware/maintenanceValidation.js';
import { toMonitoringError } from '../utils/zabbixClient.js';

export const createInventoryController = ({ zabbix }: AppDeps) => {
  /**
   * Substring search over host technical and visible names.
   * POST /api/inventory/hosts/search
   */
  const searchHosts = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { search }: SearchBody = req.body;
      const hosts = await zabbix.searchHosts(search);
      res.json({
        success: true,
        data: { search_term: search, hosts_found: hosts.length, hosts },
      });
    } catch (error) {
      next(toMonitoringError(error));
    }
  };

  /**
   * Substring search over host group names.
   * POST /api/inventory/groups/search
   */
  const searchGroups = async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { search }: SearchBody = req.body;
      const groups = await zabbix.searchHostGroups(search);
      res.json({
        success: true,
        data: { search_term: search, groups_found: groups.length, groups },
      });
    } catch (error) {
      next(toMonitoringError(error));
    }
  };

  return { searchHosts, searchGroups };
};
