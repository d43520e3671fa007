export const PORTAL_BASE_URL = "https://www.tnpds.gov.in";
export const PORTAL_SEARCH_URL = `${PORTAL_BASE_URL}/pages/reports/pds-report-state.xhtml`;

export const BROWSER_POLICY = {
  VIEWPORT: { width: 1920, height: 1080 },
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  ARGS: [
    "--no-sandbox",
    "--disable-setuid-sandbox",
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-extensions",
    "--disable-blink-features=AutomationControlled",
  ],
} as const;

export const TIMEOUTS = {
  WAIT: 20_000,
  DIALOG: 15_000,
  NAVIGATION: 60_000,
  POLL_INTERVAL: 250,
} as const;

export const RETRY = {
  MAX_ATTEMPTS: 3,
  PAUSE_MS: 2_000,
} as const;

// Header text (normalised) → record field. First alias found in the header row wins.
export const TRANSACTION_COLUMNS = {
  reference: ["BILL NUMBER", "BILL NO", "TRANSACTION NUMBER", "TRANSACTION NO"],
  date: ["DATE & TIME", "DATE AND TIME", "DATE"],
  amount: ["AMOUNT", "TOTAL AMOUNT"],
} as const;

export const BILL_COLUMNS = {
  itemName: ["PRODUCT NAME", "PRODUCT", "ITEM", "ITEM NAME", "COMMODITY"],
  quantity: ["QUANTITY", "QTY"],
  unitPrice: ["UNIT PRICE", "PRICE", "RATE"],
  total: ["TOTAL", "TOTAL PRICE", "TOTAL AMOUNT"],
} as const;

// S.No, Product, Quantity, Unit Price, Total, Unit
export const BILL_POSITIONAL_LAYOUT = {
  itemName: 1,
  quantity: 2,
  unitPrice: 3,
  total: 4,
} as const;

export const CONFIG_DIR = ".pds-shop-crawler";
export const CONFIG_FILE = "config.json";
export const VOCABULARY_FILE = "status-vocabulary.json";
export const DEFAULT_OUTPUT_FILE = "shop_status_results.json";
export const DEFAULT_ARTIFACTS_DIR = "artifacts";
