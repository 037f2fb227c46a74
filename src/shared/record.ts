export const SMART_FACT_STATUSES = [
  "candidate",
  "draft",
  "review",
  "published",
  "live",
  "retired",
  "archived"
] as const;

export type SmartFactStatus = (typeof SMART_FACT_STATUSES)[number];

export type CallToAction = {
  text: string;
  url: string;
};

export type SmartFactRecord = {
  id: string;
  status: SmartFactStatus;
  type: string; // category tag, e.g. "home-equity"
  content: string;
  priority: number | null;
  templateKeys: string[];
  isDynamic: boolean;
  cta: CallToAction | null;
  hasCta: boolean;
  requiredContext: string[];
  requiresPrimaryUser: boolean;
  requiresProfileComplete: boolean;
};

export type AggregateCounts = {
  total: number;
  status: Record<SmartFactStatus, number>;
  type: Record<string, number>;
  dynamic: number;
  withCta: number;
};

export type DashboardPage = {
  html: string;
  records: SmartFactRecord[];
  counts: AggregateCounts;
  lastUpdated: string;
};
