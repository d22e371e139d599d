import type { Report } from "@fleetfuel/core";
import { formatLiters, formatProgram, renderReportLine } from "@fleetfuel/analytics";

import type { DictionaryProvider } from "../dictionaries/dictionaryProvider.js";
import type { DraftFields, FormState } from "../form/reportForm.js";
import {
  confirmationKeyboard,
  litersKeyboard,
  mainMenu,
  optionsKeyboard,
  photosKeyboard,
} from "./keyboards.js";
import { text, type OutboundMessage } from "./types.js";

export function welcome(name?: string): string {
  const greeting = name ? `👋 Welcome to the fleet fuel log, ${name}!` : "👋 Welcome to the fleet fuel log!";
  return `${greeting}\n\nUse the menu below to submit a fuel report, view analytics or browse recent reports.`;
}

export const HELP = [
  "ℹ️ How to use this bot",
  "",
  "📝 New Report: boat, captain, program, pier, liters and optional photos, then confirm.",
  "📊 Analytics: statistics by boat, captain or program for a chosen period, plus CSV export.",
  "📋 History: the latest submitted reports.",
  "",
  "Commands:",
  "/report - start a new report",
  "/cancel - cancel the report in progress",
  "/help - show this message",
].join("\n");

export const NOT_ALLOWED = "⛔ Sorry, you are not allowed to use this bot. Ask the fleet manager for access.";
export const CANCELLED = "❌ Report cancelled.";
export const NOTHING_TO_CANCEL = "There is no report in progress.";
export const NO_DRAFT = "This report is no longer active. Press 📝 New Report to start again.";
export const SAVE_FAILED = "⚠️ The report could not be saved. Please press ✅ Confirm to try again.";
export const STORAGE_UNAVAILABLE = "⚠️ Reports are unavailable right now. Please try again later.";
export const USE_MENU = "Please use the menu below.";
export const ANALYTICS_MENU = "📊 Analytics\n\nChoose a view:";
export const CHOOSE_PERIOD = "📅 Choose a period:";
export const FORWARD_TO_MANAGEMENT = "📥 Ready to forward to management";
export const EXPORT_MENU = "📥 Export to CSV\n\nChoose what to export:";
export const NO_REPORTS = "No reports yet.";

function photoCount(fields: DraftFields): number {
  return (fields.odometerPhotoId ? 1 : 0) + (fields.receiptPhotoId ? 1 : 0);
}

export function renderDraft(fields: DraftFields): string {
  const program = fields.program ? formatProgram({ program: fields.program, privateRoute: fields.privateRoute ?? null }) : "—";
  return [
    `🚤 Boat: ${fields.boat ?? "—"}`,
    `👨‍✈️ Captain: ${fields.captain ?? "—"}`,
    `🏝 Program: ${program}`,
    `⚓ Pier: ${fields.pier ?? "—"}`,
    `⛽ Liters: ${fields.liters !== undefined ? formatLiters(fields.liters) : "—"}`,
    `📸 Photos: ${photoCount(fields)}/2`,
  ].join("\n");
}

/** The question for the state's current step, with its keyboard. */
export function promptFor(state: FormState, dict: DictionaryProvider): OutboundMessage {
  switch (state.step) {
    case "awaiting_boat":
      return text("🚤 Select the boat:", optionsKeyboard("boat", dict.listBoats()));
    case "awaiting_captain":
      return text("👨‍✈️ Select the captain:", optionsKeyboard("captain", dict.listCaptains()));
    case "awaiting_program":
      return text("🏝 Select the program:", optionsKeyboard("program", dict.listPrograms()));
    case "awaiting_private_route":
      return text("🗺 Select the private tour route:", optionsKeyboard("privateRoute", dict.listPrivateRoutes()));
    case "awaiting_pier":
      return text("⚓ Select the pier:", optionsKeyboard("pier", dict.listPiers()));
    case "awaiting_liters":
      return text("⛽ Enter the liters used (e.g. 45.5):", litersKeyboard);
    case "awaiting_photos":
      if (state.editing && state.fields.odometerPhotoId === state.editing.odometerPhotoId) {
        return text("📸 Send new photos, odometer first. Or press ⏭ Skip to keep the current ones.", photosKeyboard);
      }
      return state.fields.odometerPhotoId
        ? text("✅ Odometer photo received. Send the receipt photo or press ⏭ Skip.", photosKeyboard)
        : text("📸 Send the odometer photo, then the receipt photo. Or press ⏭ Skip.", photosKeyboard);
    case "awaiting_confirmation": {
      const isPrivate = state.fields.program !== undefined && dict.isPrivateTour(state.fields.program);
      return text(`📋 Check the report:\n\n${renderDraft(state.fields)}`, confirmationKeyboard(isPrivate));
    }
    case "completed":
    case "cancelled":
      return text(USE_MENU, mainMenu);
  }
}

export function savedMessage(report: Report): OutboundMessage {
  return text(`✅ Report saved!\n\n${renderDraft(report)}`, mainMenu);
}

export function renderHistory(title: string, reports: readonly Report[]): string {
  if (!reports.length) return `${title}\n\n${NO_REPORTS}`;
  return [title, "", reports.map(renderReportLine).join("\n\n")].join("\n");
}
