import type { WampDict, WampList, WampValue } from "@wampkit/core";

/** Quoted rendering, strings included (`"text"`) */
export function reprValue(value: WampValue): string {
  return JSON.stringify(value);
}

/** Plain rendering: strings as-is, everything else as JSON */
export function displayValue(value: WampValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function joinArgs(args: WampList, render: (value: WampValue) => string): string {
  return args.map(render).join(", ");
}

export function joinKwargs(kwargs: WampDict): string {
  return Object.entries(kwargs)
    .map(([key, value]) => `${key}=${reprValue(value)}`)
    .join(", ");
}
