export type IngestionConfig = {
  entity: string;
  timeZone: string;
  initialLookbackHours: number;
  writeRetries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export type IngestionConfigInput = Partial<IngestionConfig>;

export const defaultIngestionConfig: IngestionConfig = {
  entity: "tracks",
  timeZone: "UTC",
  initialLookbackHours: 24,
  writeRetries: 3,
  minDelayMs: 250,
  maxDelayMs: 5000
};

export const ingestionCaps = {
  initialLookbackHours: { min: 1, max: 8760 },
  writeRetries: { min: 0, max: 10 },
  minDelayMs: { min: 1, max: 60000 },
  maxDelayMs: { min: 1, max: 300000 }
} as const;

const ENTITY_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const validateIngestionConfig = (config: IngestionConfig): IngestionConfig => {
  if (!ENTITY_PATTERN.test(config.entity)) {
    throw new Error(`entity=${config.entity} must match ${ENTITY_PATTERN.source}`);
  }
  if (!isValidTimeZone(config.timeZone)) {
    throw new Error(`timeZone=${config.timeZone} is not a valid IANA time zone`);
  }
  const { initialLookbackHours, writeRetries, minDelayMs, maxDelayMs } = ingestionCaps;
  assertIntegerInRange("initialLookbackHours", config.initialLookbackHours, initialLookbackHours.min, initialLookbackHours.max);
  assertIntegerInRange("writeRetries", config.writeRetries, writeRetries.min, writeRetries.max);
  assertIntegerInRange("minDelayMs", config.minDelayMs, minDelayMs.min, minDelayMs.max);
  assertIntegerInRange("maxDelayMs", config.maxDelayMs, minDelayMs.min, maxDelayMs.max);
  if (config.maxDelayMs < config.minDelayMs) {
    throw new Error(`maxDelayMs=${config.maxDelayMs} must be >= minDelayMs=${config.minDelayMs}`);
  }
  return config;
};

export const resolveIngestionConfig = (input: IngestionConfigInput = {}): IngestionConfig =>
  validateIngestionConfig({
    ...defaultIngestionConfig,
    ...input,
    entity: input.entity?.trim() || defaultIngestionConfig.entity,
    timeZone: input.timeZone?.trim() || defaultIngestionConfig.timeZone
  });
