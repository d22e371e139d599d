import type { NewReport } from "@fleetfuel/core";

import type { DictionaryProvider } from "../dictionaries/dictionaryProvider.js";
import { ValidationError } from "../errors.js";

export type FormStep =
  | "awaiting_boat"
  | "awaiting_captain"
  | "awaiting_program"
  | "awaiting_private_route"
  | "awaiting_pier"
  | "awaiting_liters"
  | "awaiting_photos"
  | "awaiting_confirmation"
  | "completed"
  | "cancelled";

export type SelectField = "boat" | "captain" | "program" | "privateRoute" | "pier";

/** Steps the confirmation screen can jump back to. */
export type EditTarget = SelectField | "liters" | "photos";

export type DraftFields = {
  boat?: string;
  captain?: string;
  program?: string;
  privateRoute?: string | null;
  pier?: string;
  liters?: number;
  odometerPhotoId?: string | null;
  receiptPhotoId?: string | null;
};

export type FormState = {
  step: FormStep;
  fields: DraftFields;
  // Steps visited before the current one; "back" pops from here. Edit detours are not recorded.
  history: FormStep[];
  // Fields as they were on the confirmation screen while one of them is being corrected.
  editing: DraftFields | null;
};

export type FormInput =
  | { kind: "select"; field: SelectField; value: string }
  | { kind: "text"; text: string }
  | { kind: "photo"; fileId: string }
  | { kind: "skip" }
  | { kind: "back" }
  | { kind: "confirm" }
  | { kind: "edit"; target: EditTarget }
  | { kind: "cancel" };

export type ReportFields = Omit<NewReport, "userId">;

export type StepResult =
  | { kind: "advanced"; state: FormState }
  | { kind: "rejected"; state: FormState; error: ValidationError }
  | { kind: "submit"; state: FormState; report: ReportFields }
  | { kind: "cancelled"; state: FormState };

const SELECT_STEPS: Record<SelectField, FormStep> = {
  boat: "awaiting_boat",
  captain: "awaiting_captain",
  program: "awaiting_program",
  privateRoute: "awaiting_private_route",
  pier: "awaiting_pier",
};

const EDIT_STEPS: Record<EditTarget, FormStep> = {
  ...SELECT_STEPS,
  liters: "awaiting_liters",
  photos: "awaiting_photos",
};

const FIELD_LABELS: Record<SelectField, string> = {
  boat: "boat",
  captain: "captain",
  program: "program",
  privateRoute: "private tour route",
  pier: "pier",
};

export function newForm(): FormState {
  return { step: "awaiting_boat", fields: {}, history: [], editing: null };
}

export function isTerminal(step: FormStep): boolean {
  return step === "completed" || step === "cancelled";
}

function selectFieldFor(step: FormStep): SelectField | undefined {
  switch (step) {
    case "awaiting_boat":
      return "boat";
    case "awaiting_captain":
      return "captain";
    case "awaiting_program":
      return "program";
    case "awaiting_private_route":
      return "privateRoute";
    case "awaiting_pier":
      return "pier";
    default:
      return undefined;
  }
}

/** Returns the fields as a report when every required one is present. */
export function completeFields(fields: DraftFields, dict: DictionaryProvider): ReportFields | null {
  const { boat, captain, program, pier, liters } = fields;
  if (boat === undefined || captain === undefined || program === undefined) return null;
  if (pier === undefined || liters === undefined) return null;

  const privateRoute = fields.privateRoute ?? null;
  if (dict.isPrivateTour(program) && privateRoute === null) return null;

  return {
    boat,
    captain,
    program,
    privateRoute,
    pier,
    liters,
    odometerPhotoId: fields.odometerPhotoId ?? null,
    receiptPhotoId: fields.receiptPhotoId ?? null,
  };
}

/** Natural successor of `step` given what has been collected. */
function successor(step: FormStep, fields: DraftFields, dict: DictionaryProvider): FormStep {
  switch (step) {
    case "awaiting_boat":
      return "awaiting_captain";
    case "awaiting_captain":
      return "awaiting_program";
    case "awaiting_program":
      return fields.program !== undefined && dict.isPrivateTour(fields.program)
        ? "awaiting_private_route"
        : "awaiting_pier";
    case "awaiting_private_route":
      return "awaiting_pier";
    case "awaiting_pier":
      return "awaiting_liters";
    case "awaiting_liters":
      return "awaiting_photos";
    case "awaiting_photos":
      return "awaiting_confirmation";
    default:
      return step;
  }
}

function moveOn(state: FormState, fields: DraftFields, dict: DictionaryProvider): StepResult {
  if (state.editing === null) {
    return {
      kind: "advanced",
      state: { step: successor(state.step, fields, dict), fields, history: [...state.history, state.step], editing: null },
    };
  }

  // While editing, jump straight back once nothing is missing.
  if (completeFields(fields, dict)) {
    return { kind: "advanced", state: { ...state, step: "awaiting_confirmation", fields, editing: null } };
  }
  return { kind: "advanced", state: { ...state, step: successor(state.step, fields, dict), fields } };
}

function reject(state: FormState, message: string): StepResult {
  return { kind: "rejected", state, error: new ValidationError(message) };
}

/** Accepts "12.5", "12,5" and surrounding whitespace. Returns null for anything else. */
export function parseLiters(text: string): number | null {
  const normalized = text.trim().replace(",", ".");
  if (!/^\d+(\.\d+)?$|^\.\d+$/.test(normalized)) return null;
  const n = Number(normalized);
  return Number.isFinite(n) && n > 0 ? n : null;
}

function applySelection(
  state: FormState,
  field: SelectField,
  input: string,
  dict: DictionaryProvider,
): StepResult {
  const value = dict.resolve(field, input);
  if (value === null) return reject(state, `Unknown ${FIELD_LABELS[field]}: "${input.trim()}". Choose one of the options.`);

  const fields: DraftFields = { ...state.fields };
  switch (field) {
    case "program":
      fields.program = value;
      // Picking a program always resets the route; the private tour asks for it next.
      fields.privateRoute = null;
      break;
    case "privateRoute":
      fields.privateRoute = value;
      break;
    default:
      fields[field] = value;
  }
  return moveOn(state, fields, dict);
}

/**
 * Pure transition function of the report form. Invalid input leaves the
 * state untouched and returns a rejection carrying a ValidationError.
 */
export function advanceForm(state: FormState, input: FormInput, dict: DictionaryProvider): StepResult {
  if (isTerminal(state.step)) return reject(state, "This report is already closed. Start a new one.");

  switch (input.kind) {
    case "cancel":
      return { kind: "cancelled", state: { ...state, step: "cancelled" } };

    case "back": {
      // Backing out of an edit restores the fields shown on the confirmation screen.
      if (state.editing) {
        return { kind: "advanced", state: { ...state, step: "awaiting_confirmation", fields: state.editing, editing: null } };
      }
      const prev = state.history[state.history.length - 1];
      if (prev === undefined) return { kind: "cancelled", state: { ...state, step: "cancelled" } };
      return {
        kind: "advanced",
        state: { ...state, step: prev, history: state.history.slice(0, -1) },
      };
    }

    case "select": {
      if (selectFieldFor(state.step) !== input.field) return reject(state, "That option is not available at this step.");
      return applySelection(state, input.field, input.value, dict);
    }

    case "text": {
      const field = selectFieldFor(state.step);
      if (field) return applySelection(state, field, input.text, dict);
      if (state.step === "awaiting_liters") {
        const liters = parseLiters(input.text);
        if (liters === null) return reject(state, "Enter the amount of fuel as a positive number, e.g. 45.5");
        return moveOn(state, { ...state.fields, liters }, dict);
      }
      if (state.step === "awaiting_photos") return reject(state, "Send a photo or press Skip.");
      return reject(state, "Use the buttons below.");
    }

    case "photo": {
      if (state.step !== "awaiting_photos") return reject(state, "A photo is not expected at this step.");
      // During a photo edit the first new photo replaces the old pair.
      const firstOfEdit = state.editing !== null && state.fields.odometerPhotoId === state.editing.odometerPhotoId;
      if (!state.fields.odometerPhotoId || firstOfEdit) {
        return {
          kind: "advanced",
          state: { ...state, fields: { ...state.fields, odometerPhotoId: input.fileId, receiptPhotoId: null } },
        };
      }
      return moveOn(state, { ...state.fields, receiptPhotoId: input.fileId }, dict);
    }

    case "skip":
      if (state.step !== "awaiting_photos") return reject(state, "This step cannot be skipped.");
      return moveOn(state, { ...state.fields }, dict);

    case "confirm": {
      if (state.step !== "awaiting_confirmation") return reject(state, "Nothing to confirm yet.");
      const report = completeFields(state.fields, dict);
      if (!report) return reject(state, "The report is incomplete.");
      return { kind: "submit", state, report };
    }

    case "edit": {
      if (state.step !== "awaiting_confirmation") return reject(state, "Editing is available on the confirmation screen.");
      const target = EDIT_STEPS[input.target];
      if (target === "awaiting_private_route" && !(state.fields.program && dict.isPrivateTour(state.fields.program))) {
        return reject(state, "This program has no private tour route.");
      }
      return { kind: "advanced", state: { ...state, step: target, editing: state.fields } };
    }
  }
}

