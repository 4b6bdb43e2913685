import type { AppServices } from "@app/services";
import {
  ThreadParamsSchema,
  ThreadSummarySchema,
  UpdateProfileSchema,
  UserParamsSchema,
} from "@interfaces/http/profiles/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { NextFunction, Request, Response } from "express";

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export interface ProfileController {
  getUserContext: Handler;
  updateUserProfile: Handler;
  getThread: Handler;
  updateThreadSummary: Handler;
}

export function createProfileController(services: AppServices): ProfileController {
  return {
    async getUserContext(req, res, next) {
      try {
        const { userId } = parseRequest(UserParamsSchema, req.params, "params");
        res.json({ context: await services.profiles.getUserContext(userId) });
      } catch (err: unknown) {
        next(err);
      }
    },

    async updateUserProfile(req, res, next) {
      try {
        const { userId } = parseRequest(UserParamsSchema, req.params, "params");
        const update = parseRequest(UpdateProfileSchema, req.body);

        res.json({
          context: await services.profiles.updateUserProfile(userId, update),
        });
      } catch (err: unknown) {
        next(err);
      }
    },

    async getThread(req, res, next) {
      try {
        const { threadTs } = parseRequest(ThreadParamsSchema, req.params, "params");
        res.json({ thread: await services.profiles.getThread(threadTs) });
      } catch (err: unknown) {
        next(err);
      }
    },

    async updateThreadSummary(req, res, next) {
      try {
        const { threadTs } = parseRequest(ThreadParamsSchema, req.params, "params");
        const { summary } = parseRequest(ThreadSummarySchema, req.body);

        res.json({
          thread: await services.profiles.updateThreadSummary(threadTs, summary),
        });
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}
