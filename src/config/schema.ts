export type OutputFormat = "iso" | "local";

export type Config = {
  defaults: {
    /** Zone for expressions without an `in` clause; null keeps UTC. */
    timezone: string | null;
    count: number;
    format: OutputFormat;
  };
  cli: {
    color: boolean;
    maxCount: number;
  };
};

export const DEFAULT_CONFIG: Config = {
  defaults: {
    timezone: null,
    count: 5,
    format: "iso",
  },
  cli: {
    color: true,
    maxCount: 1000,
  },
};
