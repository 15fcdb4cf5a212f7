import { deepFreeze } from "@/lib/utils/deepFreeze";
import type { Document } from "./types";

export * from "./types";
export * from "./schemas";

/** Point-in-time snapshot: a frozen copy, never the caller's object. */
export function freezeDocument(doc: Document): Document {
  return deepFreeze({ ...doc });
}
