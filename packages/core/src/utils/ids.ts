import { v4 as uuidv4 } from "uuid";

/** Upper-case UUID, the id format the host editor uses for drafts, materials, tracks and segments. */
export const generateId = (): string => uuidv4().toUpperCase();
