import { DictionariesSchema, type Dictionaries, type DictionaryCategory } from "@fleetfuel/core";

import { loadJsonConfig } from "../config/jsonFile.js";

export const DEFAULT_PRIVATE_TOUR_PROGRAM = "N/A";

export type DictionaryProvider = {
  listBoats(): readonly string[];
  listCaptains(): readonly string[];
  listPrograms(): readonly string[];
  listPiers(): readonly string[];
  /** Programs a private tour can follow: every program except the private-tour marker. */
  listPrivateRoutes(): readonly string[];
  list(category: DictionaryCategory): readonly string[];
  isValid(category: DictionaryCategory, name: string): boolean;
  /** Canonical name for a case-insensitive, trimmed match, or null. */
  resolve(category: DictionaryCategory, input: string): string | null;
  isPrivateTour(program: string): boolean;
  readonly privateTourProgram: string;
};

const CATEGORIES: readonly DictionaryCategory[] = ["boat", "captain", "program", "privateRoute", "pier"];

const normalize = (s: string) => s.trim().toLocaleLowerCase();

export function createDictionaryProvider(dict: Dictionaries): DictionaryProvider {
  const privateTourProgram = dict.privateTourProgram ?? DEFAULT_PRIVATE_TOUR_PROGRAM;

  const lists: Record<DictionaryCategory, readonly string[]> = Object.freeze({
    boat: Object.freeze([...dict.boats]),
    captain: Object.freeze([...dict.captains]),
    program: Object.freeze([...dict.programs]),
    privateRoute: Object.freeze(dict.programs.filter((p) => p !== privateTourProgram)),
    pier: Object.freeze([...dict.piers]),
  });

  const lookups = new Map<DictionaryCategory, Map<string, string>>();
  for (const category of CATEGORIES) {
    const m = new Map<string, string>();
    for (const n of lists[category]) if (!m.has(normalize(n))) m.set(normalize(n), n);
    lookups.set(category, m);
  }

  const resolve = (category: DictionaryCategory, input: string): string | null =>
    lookups.get(category)?.get(normalize(input)) ?? null;

  return {
    privateTourProgram,
    listBoats: () => lists.boat,
    listCaptains: () => lists.captain,
    listPrograms: () => lists.program,
    listPiers: () => lists.pier,
    listPrivateRoutes: () => lists.privateRoute,
    list: (category) => lists[category],
    isValid: (category, name) => lists[category].includes(name),
    resolve,
    isPrivateTour: (program) => program === privateTourProgram,
  };
}

export async function loadDictionaryProvider(path: string): Promise<DictionaryProvider> {
  return createDictionaryProvider(await loadJsonConfig(DictionariesSchema, path));
}
