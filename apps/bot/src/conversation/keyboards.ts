import type { DictionaryCategory, PeriodCode } from "@fleetfuel/core";

import type { AnalyticsView, CsvExportKind, ManagementReportKind } from "../analytics/analyticsService.js";
import type { EditTarget } from "../form/reportForm.js";
import type { Button, Keyboard } from "./types.js";

export const MENU = {
  newReport: "📝 New Report",
  analytics: "📊 Analytics",
  history: "📋 History",
  help: "ℹ️ Help",
} as const;

export const mainMenu: Keyboard = {
  kind: "menu",
  rows: [
    [MENU.newReport, MENU.analytics],
    [MENU.history, MENU.help],
  ],
};

// Callback data stays under Telegram's 64 byte limit: options are sent by index.
export const CB = {
  select: "sel",
  form: "form",
  edit: "edit",
  view: "view",
  period: "period",
  exportMenu: "export",
  csv: "csv",
  history: "hist",
  report: "mgmt",
} as const;

const navRow: Button[] = [
  { text: "⬅️ Back", data: `${CB.form}:back` },
  { text: "❌ Cancel", data: `${CB.form}:cancel` },
];

function chunk<T>(items: readonly T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) rows.push(items.slice(i, i + size));
  return rows;
}

export function optionsKeyboard(category: DictionaryCategory, names: readonly string[]): Keyboard {
  const buttons = names.map((name, idx) => ({ text: name, data: `${CB.select}:${category}:${idx}` }));
  return { kind: "inline", rows: [...chunk(buttons, 2), navRow] };
}

export const litersKeyboard: Keyboard = { kind: "inline", rows: [navRow] };

export const photosKeyboard: Keyboard = {
  kind: "inline",
  rows: [[{ text: "⏭ Skip", data: `${CB.form}:skip` }], navRow],
};

const EDIT_BUTTONS: { target: EditTarget; text: string }[] = [
  { target: "boat", text: "🚤 Boat" },
  { target: "captain", text: "👨‍✈️ Captain" },
  { target: "program", text: "🏝 Program" },
  { target: "privateRoute", text: "🗺 Route" },
  { target: "pier", text: "⚓ Pier" },
  { target: "liters", text: "⛽ Liters" },
  { target: "photos", text: "📸 Photos" },
];

export function confirmationKeyboard(isPrivateTour: boolean): Keyboard {
  const edits = EDIT_BUTTONS.filter((b) => isPrivateTour || b.target !== "privateRoute").map((b) => ({
    text: `✏️ ${b.text}`,
    data: `${CB.edit}:${b.target}`,
  }));
  return {
    kind: "inline",
    rows: [
      [
        { text: "✅ Confirm", data: `${CB.form}:confirm` },
        { text: "❌ Cancel", data: `${CB.form}:cancel` },
      ],
      ...chunk(edits, 2),
      [{ text: "⬅️ Back", data: `${CB.form}:back` }],
    ],
  };
}

export const analyticsKeyboard: Keyboard = {
  kind: "inline",
  rows: [
    [
      { text: "🚤 Boats", data: `${CB.view}:boats` },
      { text: "👨‍✈️ Captains", data: `${CB.view}:captains` },
    ],
    [
      { text: "🏝 Programs", data: `${CB.view}:programs` },
      { text: "📊 Summary", data: `${CB.view}:summary` },
    ],
    [
      { text: "🏆 Ranking", data: `${CB.view}:ranking` },
      { text: "📥 Export CSV", data: CB.exportMenu },
    ],
    [
      { text: "📊 Daily report", data: `${CB.report}:daily` },
      { text: "📊 Yesterday", data: `${CB.report}:yesterday` },
    ],
    [
      { text: "📈 Weekly report", data: `${CB.report}:weekly` },
      { text: "📅 Monthly report", data: `${CB.report}:monthly` },
    ],
  ],
};

export const MANAGEMENT_REPORTS: readonly ManagementReportKind[] = ["daily", "yesterday", "weekly", "monthly"];

const PERIOD_BUTTONS: { code: PeriodCode; text: string }[] = [
  { code: "week", text: "📅 Week" },
  { code: "month", text: "📅 Month" },
  { code: "this_month", text: "📆 This month" },
  { code: "3months", text: "📅 3 months" },
  { code: "all", text: "♾ All time" },
];

export function periodKeyboard(view: AnalyticsView): Keyboard {
  const buttons = PERIOD_BUTTONS.map((p) => ({ text: p.text, data: `${CB.period}:${view}:${p.code}` }));
  return { kind: "inline", rows: chunk(buttons, 2) };
}

const EXPORT_BUTTONS: { kind: CsvExportKind; text: string }[] = [
  { kind: "reports", text: "📄 All reports" },
  { kind: "boats", text: "🚤 Boat stats" },
  { kind: "captains", text: "👨‍✈️ Captain stats" },
];

export const exportKeyboard: Keyboard = {
  kind: "inline",
  rows: EXPORT_BUTTONS.map((b) => [{ text: b.text, data: `${CB.csv}:${b.kind}` }]),
};

export const historyKeyboard: Keyboard = {
  kind: "inline",
  rows: [
    [
      { text: "📋 All reports", data: `${CB.history}:all` },
      { text: "👤 My reports", data: `${CB.history}:mine` },
    ],
  ],
};
