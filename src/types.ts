export interface ShopQuery {
  readonly id: string;
  readonly district: string;
  readonly taluk: string;
}

export type ShopStatus = "online" | "offline" | "unknown";

export interface TransactionSummary {
  date: string;
  amount: string;
  reference: string;
}

export interface BillItem {
  itemName: string;
  quantity: string;
  unitPrice: string;
  total: string;
}

export type ErrorKind =
  | "ElementNotFound"
  | "TimeoutFailure"
  | "ExtractionTimeout"
  | "SessionLost"
  | "NotAttempted"
  | "NavigationFailure"
  | "ClassificationFailure"
  | "UnknownFailure";

export type PipelineStage = "navigation" | "classification" | "extraction";

export interface DebugArtifact {
  attempt: number;
  screenshot?: string;
  html?: string;
}

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  stage?: PipelineStage;
  attempts: number;
  artifacts: DebugArtifact[];
}

export interface ShopRecord {
  query: ShopQuery;
  status: ShopStatus;
  shopDetails?: Record<string, string>;
  lastTransaction?: TransactionSummary;
  billItems: BillItem[];
  error?: ErrorInfo;
  capturedAt: string;
}

export interface RunOptions {
  readonly headless: boolean;
  readonly includeDetails: boolean;
}

export interface ReportSummary {
  total: number;
  online: number;
  offline: number;
  unknown: number;
  failed: number;
  notAttempted: number;
  durationMs: number;
}

export interface CrawlReport {
  generatedAt: string;
  summary: ReportSummary;
  shops: ShopRecord[];
}

export interface StatusVocabulary {
  online: string[];
  offline: string[];
}
