import { Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuthRequest } from '../types/index.js';
import { Errors } from '../utils/AppError.js';
import { toMonitoringError, type ZabbixApi } from '../utils/zabbixClient.js';

const userInfoSchema = z.object({
  userid: z.union([z.string(), z.number()]).transform(String).pipe(z.string().min(1)),
  username: z.string().optional(),
  name: z.string().optional(),
  surname: z.string().optional(),
});

/**
 * Authenticate Zabbix users.
 *
 * The frontend widget runs inside a Zabbix session and sends the logged-in
 * user as `user_info` in the request body.  The id is confirmed with
 * `user.get` before the user is attached to `req.user`.
 */
export const createAuthenticate = (zabbix: ZabbixApi) => {
  return async (req: AuthRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = userInfoSchema.safeParse(req.body?.user_info);
      if (!parsed.success) {
        throw Errors.unauthorized();
      }

      const user = await zabbix.getUser(parsed.data.userid);
      if (!user) {
        throw Errors.unauthorized('Unknown Zabbix user.');
      }

      req.user = {
        ...parsed.data,
        username: parsed.data.username ?? user.username,
      };
      next();
    } catch (error) {
      next(toMonitoringError(error));
    }
  };
};
