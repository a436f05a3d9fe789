/** Added lines land on 10, 11, 12 then 15, 16 of the new file. */
export const TWO_RUN_HUNK = [
  "@@ -8,2 +10,3 @@",
  "+const width = 10;",
  "+const height = 20;",
  "+const area = width * height;",
  "@@ -12,1 +15,2 @@",
  "+export function describeArea() {",
  "+  return `area: ${area}`;",
].join("\n");

export const SINGLE_RUN_HUNK = [
  "@@ -1,1 +1,2 @@",
  "+export type Id = any;",
  "+export type Name = string;",
].join("\n");

export const CONTEXT_AND_REMOVALS_HUNK = [
  "@@ -20,4 +20,4 @@ function load()",
  " const file = read(path);",
  "-return file;",
  "+return file.trim();",
  " }",
  "+",
  "+// trailing note",
].join("\n");

export const REMOVALS_ONLY_HUNK = [
  "@@ -5,2 +5,0 @@",
  "-const unused = 1;",
  "-const alsoUnused = 2;",
].join("\n");
