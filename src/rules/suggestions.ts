import catalog from './suggestions.json';

export interface CategoryText {
  message: string;
  suggestion: string;
}

export type TemplateVars = Record<string, string | number | undefined>;

const texts: Record<string, CategoryText> = catalog;

export function getCategoryText(category: string): CategoryText {
  const text = texts[category];
  if (!text) {
    throw new Error(`No message template for category "${category}"`);
  }
  return text;
}

// Replaces {placeholder} tokens; unknown or undefined placeholders are left as-is
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template
    .replace(/\{(\w+)\}/g, (token: string, key: string) => {
      const value = vars[key];
      return value === undefined ? token : String(value);
    })
    .trim();
}
