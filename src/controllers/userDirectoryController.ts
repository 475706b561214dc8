import { Request, Response, NextFunction } from 'express';
import { UserDirectoryService } from '../services/userDirectoryService';
import { formatApiResponse } from '../utils/formatApiResponse';
import { queryString, readPageParams } from '../utils/pageParams';

export function createUserDirectoryController(service: UserDirectoryService) {
  async function listUsers(req: Request, res: Response, next: NextFunction) {
    try {
      const payload = await service.listUsers(
        { role: queryString(req, 'role'), profession: queryString(req, 'profession') },
        readPageParams(req)
      );
      return res.json(formatApiResponse('success', 'OK', payload));
    } catch (error) {
      return next(error);
    }
  }

  return { listUsers };
}

export type UserDirectoryController = ReturnType<typeof createUserDirectoryController>;
