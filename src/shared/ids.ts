import { v7 as uuidv7 } from "uuid";

export function createRunId(): string {
  return uuidv7();
}

// 20260314_091502, used in report file names.
export function runStamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
