import type { AttributeNaming } from "./types.js";

/**
 * Maps attribute keys between the wire style and camelCase resource fields.
 */
export interface NamingStrategy {
  /** Wire attribute key → resource field name */
  toFieldName(wireKey: string): string;
  /** Resource field name → wire attribute key */
  toWireName(fieldName: string): string;
}

function splitWords(key: string, separator: string): string {
  return key.replace(/[A-Z]/g, (letter) => `${separator}${letter.toLowerCase()}`);
}

function joinWords(key: string, separator: string): string {
  const pattern = new RegExp(`\\${separator}([a-z0-9])`, "g");
  return key.replace(pattern, (_match, letter: string) => letter.toUpperCase());
}

const identity: NamingStrategy = {
  toFieldName: (key) => key,
  toWireName: (key) => key,
};

export function createNamingStrategy(naming: AttributeNaming): NamingStrategy {
  switch (naming) {
    case "identity":
    case "camelCase":
      return identity;
    case "kebab-case":
      return {
        toFieldName: (key) => joinWords(key, "-"),
        toWireName: (key) => splitWords(key, "-"),
      };
    case "snake_case":
      return {
        toFieldName: (key) => joinWords(key, "_"),
        toWireName: (key) => splitWords(key, "_"),
      };
  }
}
