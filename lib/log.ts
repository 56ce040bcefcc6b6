function isProduction(): boolean {
  return typeof process !== "undefined" && process.env?.NODE_ENV === "production";
}

export function devWarn(message: string, ...args: unknown[]): void {
  if (isProduction()) {
    return;
  }
  if (args.length) {
    console.warn(message, ...args);
  } else {
    console.warn(message);
  }
}

export function devInfo(message: string, ...args: unknown[]): void {
  if (isProduction()) {
    return;
  }
  if (args.length) {
    console.info(message, ...args);
  } else {
    console.info(message);
  }
}
