export const FREQUENCIES = ["daily", "weekly"] as const;

export type Frequency = (typeof FREQUENCIES)[number];

export type User = {
  id: string; // platform-assigned, opaque
  handle: string | null;
  displayName: string | null;
  registeredAt: string;
  updatedAt: string;
};

export type Challenge = {
  id: number;
  userId: string;
  text: string;
  frequency: Frequency;
  createdAt: string;
  active: boolean;
};

export type Completion = {
  id: number;
  userId: string;
  challengeId: number;
  completedAt: string;
};

/** One row of the windowed completion count, before names are resolved */
export type CompletionCountRow = {
  userId: string;
  handle: string | null;
  displayName: string | null;
  count: number;
};

export type LeaderboardEntry = {
  rank: number;
  userId: string;
  name: string;
  handle: string | null;
  count: number;
};

export function isFrequency(v: unknown): v is Frequency {
  return typeof v === "string" && (FREQUENCIES as readonly string[]).includes(v);
}
