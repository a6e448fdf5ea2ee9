export type WatchArgs = {
  help?: boolean;
  url?: string;
  json?: boolean;
};

export type InjectArgs = {
  help?: boolean;
  url?: string;
  arrival?: number;
  burst?: number;
  priority?: number;
  random?: number;
  lead?: number;
};

const takeValue = (token: string, next?: string): string | undefined => {
  if (token.includes("=")) return token.slice(token.indexOf("=") + 1);
  return next;
};

const flagName = (token: string) => token.split("=", 1)[0];

export const parseWatchArgs = (args: string[]): WatchArgs => {
  const parsed: WatchArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    const name = flagName(token);
    if (name === "--help" || name === "-h") {
      parsed.help = true;
    } else if (name === "--json") {
      parsed.json = true;
    } else if (name === "--url") {
      const value = takeValue(token, args[i + 1]);
      if (value !== undefined) {
        parsed.url = value;
        if (!token.includes("=")) i += 1;
      }
    } else {
      throw new Error(`unknown argument ${token}`);
    }
  }
  return parsed;
};

const NUMERIC_FLAGS: Record<string, Exclude<keyof InjectArgs, "help" | "url">> = {
  "--arrival": "arrival",
  "-a": "arrival",
  "--burst": "burst",
  "-b": "burst",
  "--priority": "priority",
  "-p": "priority",
  "--random": "random",
  "-r": "random",
  "--lead": "lead",
};

export const parseInjectArgs = (args: string[]): InjectArgs => {
  const parsed: InjectArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    const name = flagName(token);
    if (name === "--help" || name === "-h") {
      parsed.help = true;
      continue;
    }
    const value = takeValue(token, args[i + 1]);
    if (value === undefined) {
      throw new Error(`missing value for ${name}`);
    }
    if (!token.includes("=")) i += 1;
    if (name === "--url") {
      parsed.url = value;
      continue;
    }
    const key = NUMERIC_FLAGS[name];
    if (!key) {
      throw new Error(`unknown argument ${token}`);
    }
    const numeric = Number(value);
    if (!Number.isInteger(numeric)) {
      throw new Error(`${name} expects an integer, got ${value}`);
    }
    parsed[key] = numeric;
  }
  return parsed;
};
