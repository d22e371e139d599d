import type { FastifyBaseLogger } from "fastify";

import type { Report } from "@fleetfuel/core";

import type { DictionaryProvider } from "../dictionaries/dictionaryProvider.js";
import { errorMessage, StorageError, ValidationError } from "../errors.js";
import type { SessionManager } from "../sessions/sessionManager.js";
import type { ReportStore } from "../store/reportStore.js";
import { advanceForm, newForm, type FormInput, type FormState, type ReportFields } from "./reportForm.js";

export type FormOutcome =
  | { kind: "no_draft" }
  | { kind: "advanced"; state: FormState }
  | { kind: "rejected"; state: FormState; error: ValidationError }
  | { kind: "cancelled" }
  | { kind: "saved"; report: Report }
  | { kind: "save_failed"; state: FormState; error: StorageError };

// One automatic retry before the user is asked to confirm again.
const SAVE_ATTEMPTS = 2;

export class ReportFormService {
  constructor(
    private readonly sessions: SessionManager<FormState>,
    private readonly dict: DictionaryProvider,
    private readonly store: ReportStore,
    private readonly log: FastifyBaseLogger,
  ) {}

  /** Starts a fresh draft, replacing any draft in progress. */
  start(userId: string): FormState {
    const state = newForm();
    this.sessions.set(userId, state);
    return state;
  }

  current(userId: string): FormState | undefined {
    return this.sessions.get(userId);
  }

  discard(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  async apply(userId: string, input: FormInput): Promise<FormOutcome> {
    const state = this.sessions.get(userId);
    if (!state) return { kind: "no_draft" };

    const result = advanceForm(state, input, this.dict);
    switch (result.kind) {
      case "rejected":
        return result;
      case "cancelled":
        this.sessions.delete(userId);
        return { kind: "cancelled" };
      case "advanced":
        this.sessions.set(userId, result.state);
        return result;
      case "submit":
        return this.submit(userId, result.state, result.report);
    }
  }

  private async submit(userId: string, state: FormState, fields: ReportFields): Promise<FormOutcome> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= SAVE_ATTEMPTS; attempt++) {
      try {
        const report = await this.store.save({ ...fields, userId });
        this.sessions.delete(userId);
        this.log.info({ reportId: report.id, userId }, "report saved");
        return { kind: "saved", report };
      } catch (e) {
        lastError = e;
        this.log.warn({ userId, attempt, err: errorMessage(e) }, "report save failed");
      }
    }

    // The draft stays at confirmation so the user can retry.
    this.sessions.set(userId, state);
    const error = lastError instanceof StorageError ? lastError : new StorageError(errorMessage(lastError), { cause: lastError });
    this.log.error({ userId, err: error.message }, "report not saved");
    return { kind: "save_failed", state, error };
  }
}
