export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

export const isalpha = (ch: string): boolean =>
  ch.length === 1 &&
  ((ch >= "A" && ch <= "Z") || (ch >= "a" && ch <= "z"));

export const isalnum = (ch: string): boolean => isdigit(ch) || isalpha(ch);

export const isspace = (ch: string): boolean =>
  ch === " " || ch === "\t" || ch === "\n" || ch === "\v" || ch === "\f" ||
  ch === "\r";
