import type { FastifyBaseLogger } from "fastify";

import type { DictionaryCategory } from "@fleetfuel/core";
import { isPeriodCode } from "@fleetfuel/analytics";

import type { AccessGate } from "../access/accessGate.js";
import type { AnalyticsService, AnalyticsView, CsvExportKind } from "../analytics/analyticsService.js";
import type { DictionaryProvider } from "../dictionaries/dictionaryProvider.js";
import { AuthorizationError, StorageError } from "../errors.js";
import type { EditTarget, FormInput, FormState } from "../form/reportForm.js";
import type { ReportFormService } from "../form/reportFormService.js";
import type { HistoryReader } from "../history/historyReader.js";
import type { SessionManager } from "../sessions/sessionManager.js";
import {
  analyticsKeyboard,
  CB,
  exportKeyboard,
  historyKeyboard,
  mainMenu,
  MANAGEMENT_REPORTS,
  MENU,
  periodKeyboard,
} from "./keyboards.js";
import {
  ANALYTICS_MENU,
  CANCELLED,
  CHOOSE_PERIOD,
  EXPORT_MENU,
  FORWARD_TO_MANAGEMENT,
  HELP,
  NO_DRAFT,
  NOT_ALLOWED,
  NOTHING_TO_CANCEL,
  promptFor,
  renderHistory,
  SAVE_FAILED,
  savedMessage,
  STORAGE_UNAVAILABLE,
  USE_MENU,
  welcome,
} from "./messages.js";
import { text, type BotResponse, type InboundEvent, type OutboundMessage } from "./types.js";

export type ConversationDeps = {
  gate: AccessGate;
  dict: DictionaryProvider;
  forms: ReportFormService;
  sessions: SessionManager<FormState>;
  analytics: AnalyticsService;
  history: HistoryReader;
  log: FastifyBaseLogger;
};

const ANALYTICS_VIEWS: readonly AnalyticsView[] = ["boats", "captains", "programs", "summary", "ranking"];
const EXPORT_KINDS: readonly CsvExportKind[] = ["reports", "boats", "captains"];
const EDIT_TARGETS: readonly EditTarget[] = ["boat", "captain", "program", "privateRoute", "pier", "liters", "photos"];
const SELECT_CATEGORIES: readonly DictionaryCategory[] = ["boat", "captain", "program", "privateRoute", "pier"];

function oneOf<T extends string>(values: readonly T[], raw: string | undefined): T | undefined {
  return values.find((v) => v === raw);
}

const reply = (...messages: OutboundMessage[]): BotResponse => ({ messages });

export class ConversationService {
  constructor(private readonly deps: ConversationDeps) {}

  /** Handles one event. Events of the same user never run concurrently. */
  handle(event: InboundEvent): Promise<BotResponse> {
    try {
      this.deps.gate.assertAuthorized(event.userId);
    } catch (e) {
      if (!(e instanceof AuthorizationError)) throw e;
      this.deps.log.warn({ userId: event.userId }, e.message);
      return Promise.resolve(reply(text(NOT_ALLOWED)));
    }
    return this.deps.sessions.runExclusive(event.userId, async () => {
      try {
        return await this.dispatch(event);
      } catch (e) {
        if (!(e instanceof StorageError)) throw e;
        this.deps.log.error({ userId: event.userId, err: e.message }, "storage unavailable");
        return reply(text(STORAGE_UNAVAILABLE, mainMenu));
      }
    });
  }

  private async dispatch({ userId, input }: InboundEvent): Promise<BotResponse> {
    switch (input.kind) {
      case "command":
        return this.onCommand(userId, input.command);
      case "callback":
        return this.onCallback(userId, input.data);
      case "photo":
        return this.onFormInput(userId, { kind: "photo", fileId: input.fileId });
      case "text":
        return this.onText(userId, input.text);
    }
  }

  private async onCommand(userId: string, command: string): Promise<BotResponse> {
    switch (command) {
      case "start":
        return reply(text(welcome(this.deps.gate.displayName(userId)), mainMenu));
      case "help":
        return reply(text(HELP, mainMenu));
      case "report":
        return this.startReport(userId);
      case "cancel":
        return this.deps.forms.discard(userId) ? reply(text(CANCELLED, mainMenu)) : reply(text(NOTHING_TO_CANCEL, mainMenu));
      case "analytics":
        return reply(text(ANALYTICS_MENU, analyticsKeyboard));
      case "history":
        return this.showHistory(userId, "all");
      default:
        return reply(text(USE_MENU, mainMenu));
    }
  }

  private async onText(userId: string, body: string): Promise<BotResponse> {
    switch (body.trim()) {
      case MENU.newReport:
        return this.startReport(userId);
      case MENU.analytics:
        return reply(text(ANALYTICS_MENU, analyticsKeyboard));
      case MENU.history:
        return this.showHistory(userId, "all");
      case MENU.help:
        return reply(text(HELP, mainMenu));
    }

    if (!this.deps.forms.current(userId)) return reply(text(USE_MENU, mainMenu));
    return this.onFormInput(userId, { kind: "text", text: body });
  }

  private async onCallback(userId: string, data: string): Promise<BotResponse> {
    const [prefix, first, second] = data.split(":");

    switch (prefix) {
      case CB.select: {
        const field = oneOf(SELECT_CATEGORIES, first);
        if (!field) break;
        // A missing or malformed index is rejected by the form as an unknown name.
        const value =
          second !== undefined && /^\d+$/.test(second) ? this.deps.dict.list(field)[Number(second)] : undefined;
        return this.onFormInput(userId, { kind: "select", field, value: value ?? second ?? "" });
      }
      case CB.form:
        switch (first) {
          case "skip":
          case "back":
          case "confirm":
          case "cancel":
            return this.onFormInput(userId, { kind: first });
        }
        break;
      case CB.edit: {
        const target = oneOf(EDIT_TARGETS, first);
        if (target) return this.onFormInput(userId, { kind: "edit", target });
        break;
      }
      case CB.view: {
        const view = oneOf(ANALYTICS_VIEWS, first);
        if (view) return reply(text(CHOOSE_PERIOD, periodKeyboard(view)));
        break;
      }
      case CB.period: {
        const view = oneOf(ANALYTICS_VIEWS, first);
        if (view && second && isPeriodCode(second)) {
          return reply(text(await this.deps.analytics.renderView(view, second), analyticsKeyboard));
        }
        break;
      }
      case CB.exportMenu:
        return reply(text(EXPORT_MENU, exportKeyboard));
      case CB.csv: {
        const kind = oneOf(EXPORT_KINDS, first);
        if (kind) {
          const file = await this.deps.analytics.exportFile(kind);
          return reply({ kind: "document", fileName: file.fileName, content: file.content, caption: "📥 CSV export" });
        }
        break;
      }
      case CB.report: {
        const kind = oneOf(MANAGEMENT_REPORTS, first);
        if (kind) {
          const report = await this.deps.analytics.managementReport(kind);
          return reply(text(report.text, analyticsKeyboard), {
            kind: "document",
            fileName: report.file.fileName,
            content: report.file.content,
            caption: FORWARD_TO_MANAGEMENT,
          });
        }
        break;
      }
      case CB.history:
        if (first === "mine" || first === "all") return this.showHistory(userId, first);
        break;
    }

    this.deps.log.debug({ userId, data }, "unknown callback");
    return reply(text(USE_MENU, mainMenu));
  }

  private startReport(userId: string): BotResponse {
    const state = this.deps.forms.start(userId);
    return reply(text("📝 New fuel report", { kind: "remove" }), promptFor(state, this.deps.dict));
  }

  private async onFormInput(userId: string, input: FormInput): Promise<BotResponse> {
    const outcome = await this.deps.forms.apply(userId, input);
    switch (outcome.kind) {
      case "no_draft":
        return reply(text(NO_DRAFT, mainMenu));
      case "advanced":
        return reply(promptFor(outcome.state, this.deps.dict));
      case "rejected":
        return reply(text(`⚠️ ${outcome.error.message}`), promptFor(outcome.state, this.deps.dict));
      case "cancelled":
        return reply(text(CANCELLED, mainMenu));
      case "saved":
        return reply(savedMessage(outcome.report));
      case "save_failed":
        return reply(text(SAVE_FAILED), promptFor(outcome.state, this.deps.dict));
    }
  }

  private async showHistory(userId: string, scope: "all" | "mine"): Promise<BotResponse> {
    const reports =
      scope === "mine" ? await this.deps.history.userReports(userId) : await this.deps.history.recentReports();
    const title = scope === "mine" ? "👤 My latest reports" : "📋 Latest reports";
    return reply(text(renderHistory(title, reports), historyKeyboard));
  }
}
