// Replace template placeholders like {{key}} with values from data object
// Returns original placeholder if key not found or value is null/undefined
export const renderTemplate = (template: string, data?: Record<string, unknown>): string => {
  if (!data) {
    return template;
  }

  // \{\{ matches literal {{, ([^}\s]+) captures the key name
  return template.replace(/\{\{\s*([^}\s]+)\s*\}\}/g, (match: string, key: string) => {
    const value = data[key];
    if (value === undefined || value === null) {
      return match;
    }
    return String(value);
  });
};

// Step back one unit rather than split a surrogate pair
const splitPoint = (text: string, limit: number): number => {
  const last = text.charCodeAt(limit - 1);
  return limit > 1 && last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
};

// Split text into pieces no longer than limit, preferring line boundaries
// A single line longer than limit is cut into limit-sized slices
export const chunkText = (text: string, limit: number): string[] => {
  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current) {
      chunks.push(current);
    }

    let rest = line;
    while (rest.length > limit) {
      const cut = splitPoint(rest, limit);
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
};
