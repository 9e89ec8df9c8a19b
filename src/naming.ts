function uppercaseFirst(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

/** `get_item_count` -> `getItemCount` */
export function toCamelCase(s: string): string {
  return s
    .split("_")
    .map((part, i) => (i === 0 ? part : uppercaseFirst(part)))
    .join("");
}

/** `my_widget` -> `MyWidget` */
export function toPascalCase(s: string): string {
  return s.split("_").map(uppercaseFirst).join("");
}
