import pc from "picocolors";

export function success(msg: string): void {
  console.log(`${pc.green("✓")} ${msg}`);
}

export function warn(msg: string): void {
  console.log(`${pc.yellow("⚠")} ${msg}`);
}

export function error(msg: string): void {
  console.error(`${pc.red("✗")} ${msg}`);
}

export function info(msg: string): void {
  console.log(`${pc.cyan("ℹ")} ${msg}`);
}

export function table(rows: [string, string][]): void {
  const maxKey = Math.max(...rows.map(([k]) => k.length));
  for (const [key, value] of rows) {
    console.log(`  ${key.padEnd(maxKey)}  ${value}`);
  }
}

export function heading(title: string): void {
  console.log("");
  console.log(pc.bold(title));
  console.log(pc.dim("─".repeat(Math.max(title.length, 24))));
}

/** Colour a KPI flag for terminal output. */
export function flag(value: string): string {
  if (value === "HIGH") return pc.red(value);
  if (value === "LOW") return pc.yellow(value);
  if (value === "UNKNOWN") return pc.dim(value);
  return pc.green(value);
}
