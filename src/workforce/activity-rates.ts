export const DEPARTMENTS = [
  "operations",
  "engineering",
  "sales",
  "hr",
  "finance",
  "executive",
] as const;

export type Department = (typeof DEPARTMENTS)[number];

export type ActivityRateModel = {
  readonly messagesPerHour: number;
  readonly chatMessagesPerHour: number;
  readonly documentsPerDay: number;
  readonly meetingsPerDay: number;
  readonly varianceFraction: number;
  /** Inclusive, UTC. */
  readonly workStartHour: number;
  /** Exclusive, UTC. */
  readonly workEndHour: number;
};

export const DEFAULT_ACTIVITY_RATE: ActivityRateModel = Object.freeze({
  messagesPerHour: 5,
  chatMessagesPerHour: 10,
  documentsPerDay: 3,
  meetingsPerDay: 4,
  varianceFraction: 0.3,
  workStartHour: 8,
  workEndHour: 17,
});

function rate(overrides: Partial<ActivityRateModel>): ActivityRateModel {
  return Object.freeze({ ...DEFAULT_ACTIVITY_RATE, ...overrides });
}

export const DEPARTMENT_ACTIVITY_RATES: Readonly<Record<Department, ActivityRateModel>> =
  Object.freeze({
    operations: rate({ messagesPerHour: 6, chatMessagesPerHour: 8, documentsPerDay: 4 }),
    engineering: rate({
      messagesPerHour: 4,
      chatMessagesPerHour: 15,
      documentsPerDay: 6,
      meetingsPerDay: 3,
    }),
    sales: rate({
      messagesPerHour: 12,
      chatMessagesPerHour: 10,
      documentsPerDay: 3,
      meetingsPerDay: 8,
    }),
    hr: rate({ messagesPerHour: 10, chatMessagesPerHour: 8, documentsPerDay: 5, meetingsPerDay: 5 }),
    finance: rate({ messagesPerHour: 6, chatMessagesPerHour: 5, documentsPerDay: 8 }),
    executive: rate({
      messagesPerHour: 8,
      chatMessagesPerHour: 5,
      documentsPerDay: 2,
      meetingsPerDay: 10,
    }),
  });

export function isDepartment(value: unknown): value is Department {
  return typeof value === "string" && DEPARTMENTS.some((department) => department === value);
}

export function lookupActivityRate(department: string): ActivityRateModel {
  const normalized = department.trim().toLowerCase();
  return isDepartment(normalized) ? DEPARTMENT_ACTIVITY_RATES[normalized] : DEFAULT_ACTIVITY_RATE;
}

/** Returns the invariant violations of a rate model; empty when valid. */
export function validateActivityRate(model: ActivityRateModel): string[] {
  const problems: string[] = [];
  const nonNegative = [
    "messagesPerHour",
    "chatMessagesPerHour",
    "documentsPerDay",
    "meetingsPerDay",
  ] as const;
  for (const key of nonNegative) {
    const value = model[key];
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`'${key}' must be a non-negative number`);
    }
  }
  if (
    !Number.isFinite(model.varianceFraction) ||
    model.varianceFraction < 0 ||
    model.varianceFraction >= 1
  ) {
    problems.push("'varianceFraction' must be in [0, 1)");
  }
  for (const key of ["workStartHour", "workEndHour"] as const) {
    const value = model[key];
    if (!Number.isInteger(value) || value < 0 || value >= 24) {
      problems.push(`'${key}' must be an integer hour in [0, 24)`);
    }
  }
  if (model.workStartHour >= model.workEndHour) {
    problems.push("'workStartHour' must be earlier than 'workEndHour'");
  }
  return problems;
}

export function isWithinWorkHours(model: ActivityRateModel, hour: number): boolean {
  return model.workStartHour <= hour && hour < model.workEndHour;
}
