import type {
  ConversationThreadRepository,
  UserContextRepository,
} from "@domain/messages/ports";
import type {
  ConversationThread,
  UserContext,
  UserProfileUpdate,
} from "@domain/messages/types";
import { parseSlackTimestamp } from "@domain/messages/validation";
import { logEvent } from "@infrastructure/logging/Logger";
import { NotFoundError } from "@typesLocal/errors";

const PROFILE_FIELDS = ["communicationStyle", "topicsOfInterest"] as const;

/**
 * Author profiles and thread summaries.
 *
 * The counters on both are maintained by ingestion; only the descriptive
 * fields are writable here.
 */
export class ProfileUseCase {
  constructor(
    private readonly users: UserContextRepository,
    private readonly threads: ConversationThreadRepository
  ) {}

  async getUserContext(userId: string): Promise<UserContext> {
    const context = await this.users.get(userId);
    if (!context) {
      throw new NotFoundError("User context not found", { userId });
    }
    return context;
  }

  async updateUserProfile(
    userId: string,
    update: UserProfileUpdate
  ): Promise<UserContext> {
    const updated = await this.users.updateProfile(userId, update);
    if (!updated) {
      throw new NotFoundError("User context not found", { userId });
    }

    logEvent("USER_PROFILE_UPDATED", {
      userId,
      fields: PROFILE_FIELDS.filter((field) => update[field] !== undefined),
    });
    return updated;
  }

  async getThread(threadTs: string): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const thread = await this.threads.get(ts);
    if (!thread) {
      throw new NotFoundError("Thread not found", { threadTs: ts });
    }
    return thread;
  }

  async updateThreadSummary(
    threadTs: string,
    summary: string | null
  ): Promise<ConversationThread> {
    const ts = parseSlackTimestamp(threadTs, "threadTs");
    const updated = await this.threads.updateSummary(ts, summary);
    if (!updated) {
      throw new NotFoundError("Thread not found", { threadTs: ts });
    }

    logEvent("THREAD_SUMMARY_UPDATED", { threadTs: ts });
    return updated;
  }
}
