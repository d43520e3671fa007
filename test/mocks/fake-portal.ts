import { ElementNotFoundError, SessionLostError } from "../../src/core/errors.js";
import { pollUntil, type Check } from "../../src/core/timing.js";
import { SELECTORS } from "../../src/portal/selectors.js";
import type { PortalElement, PortalSession } from "../../src/core/portal-session.js";

export interface FakeTable {
  headers: string[];
  rows: string[][];
}

export interface FakeShop {
  id: string;
  /** Option label in the shop dropdown; defaults to "<id> - FAIR PRICE SHOP". */
  label?: string;
  /** Text of the status indicator; null renders no indicator at all. */
  status: string | null;
  details?: Record<string, string>;
  /** Last-transaction table on the detail page; absent means no "View" link. */
  transaction?: FakeTable;
  bill?: FakeTable;
  /** How long the dialog stays empty after opening. Infinity never fills it. */
  dialogDelayMs?: number;
}

export interface FakePortalData {
  /** When set, districts appear only after one of these states is selected. */
  states?: string[];
  districts: Record<string, Record<string, FakeShop[]>>;
  talukDelayMs?: number;
  shopDelayMs?: number;
  /** "District/Taluk" pairs whose shop dropdown never repopulates. */
  brokenTaluks?: string[];
  /** Districts whose taluk dropdown never repopulates. */
  brokenDistricts?: string[];
  /** Page language on first load; English unless set to "ta". */
  language?: "en" | "ta";
  /** How long the English option takes to re-render the page. Infinity never switches. */
  languageSwitchDelayMs?: number;
}

const PLACEHOLDER = "-- Select --";

class FakeNode implements PortalElement {
  constructor(
    readonly description: string,
    readonly text: string,
    readonly children: (selector: string) => FakeNode[] = () => [],
    readonly onClick?: () => void,
    readonly onSelect?: (label: string) => void
  ) {}
}

function textNode(description: string, text: string): FakeNode {
  return new FakeNode(description, text);
}

function tableNode(
  description: string,
  table: FakeTable,
  rowSelector: string,
  rowsVisible: () => boolean = () => true
): FakeNode {
  return new FakeNode(description, "", (selector) => {
    if (selector === SELECTORS.TABLE_HEADER_CELL) {
      return table.headers.map((h, i) => textNode(`th #${i}`, h));
    }
    if (selector === rowSelector) {
      if (!rowsVisible()) return [];
      return table.rows.map(
        (cells, r) =>
          new FakeNode(`tr #${r}`, cells.join(" "), (cellSelector) =>
            cellSelector === SELECTORS.TABLE_CELL ? cells.map((c, i) => textNode(`td #${i}`, c)) : []
          )
      );
    }
    return [];
  });
}

export function shopLabel(shop: FakeShop): string {
  return shop.label ?? `${shop.id} - FAIR PRICE SHOP`;
}

/**
 * In-process stand-in for the portal: a search form whose dependent
 * dropdowns fill in after a delay, a detail page, and a transaction dialog
 * that loads its table asynchronously.
 */
export class FakePortalSession implements PortalSession {
  readonly data: FakePortalData;
  alive = true;
  navigations = 0;
  dialogCloses = 0;
  screenshots: string[] = [];
  selected: string[] = [];
  /** Kill the session on the Nth navigateTo call (1-based). */
  crashOnNavigation: number | null = null;
  /** Make the dialog's close control throw when clicked. */
  failDialogClose = false;
  languageSwitches = 0;

  private page: "blank" | "search" | "detail" = "blank";
  private state: string | null = null;
  private district: string | null = null;
  private taluk: string | null = null;
  private shop: FakeShop | null = null;
  private talukReadyAt = 0;
  private shopReadyAt = 0;
  private dialogOpenedAt: number | null = null;
  // survives navigation, like the portal's locale cookie
  private englishAt: number | null = null;

  constructor(data: FakePortalData) {
    this.data = data;
  }

  private assertAlive(): void {
    if (!this.alive) throw new SessionLostError("Fake browser has been closed");
  }

  private select(description: string, labels: string[], onSelect: (label: string) => void): FakeNode {
    const options = [PLACEHOLDER, ...labels];
    return new FakeNode(
      description,
      options.join("\n"),
      (selector) =>
        selector === SELECTORS.SELECT_OPTION ? options.map((o, i) => textNode(`option #${i}`, o)) : [],
      undefined,
      (label) => {
        if (!labels.includes(label)) throw new Error(`No option '${label}' in ${description}`);
        this.selected.push(label);
        onSelect(label);
      }
    );
  }

  private talukMap(): Record<string, FakeShop[]> {
    return this.district ? this.data.districts[this.district] ?? {} : {};
  }

  private englishActive(): boolean {
    if (this.data.language !== "ta") return true;
    return this.englishAt !== null && Date.now() >= this.englishAt;
  }

  private searchPage(selector: string): FakeNode[] {
    const now = Date.now();
    switch (selector) {
      case SELECTORS.LANGUAGE_ENGLISH_ACTIVE:
        return this.englishActive() ? [textNode("body", "")] : [];
      case SELECTORS.LANGUAGE_ENGLISH_OPTION:
        return [
          new FakeNode("english radio", "English", () => [], () => {
            this.languageSwitches += 1;
            this.englishAt = Date.now() + (this.data.languageSwitchDelayMs ?? 0);
          }),
        ];
      case SELECTORS.STATE_SELECT:
        if (!this.data.states) return [];
        return [
          this.select("state", this.data.states, (label) => {
            this.state = label;
          }),
        ];
      case SELECTORS.DISTRICT_SELECT: {
        const visible = !this.data.states || this.state !== null;
        const labels = visible ? Object.keys(this.data.districts) : [];
        return [
          this.select("district", labels, (label) => {
            this.district = label;
            this.taluk = null;
            this.shop = null;
            this.talukReadyAt = Date.now() + (this.data.talukDelayMs ?? 0);
          }),
        ];
      }
      case SELECTORS.TALUK_SELECT: {
        const broken = this.district !== null && (this.data.brokenDistricts ?? []).includes(this.district);
        const ready = this.district !== null && !broken && now >= this.talukReadyAt;
        const labels = ready ? Object.keys(this.talukMap()) : [];
        return [
          this.select("taluk", labels, (label) => {
            this.taluk = label;
            this.shop = null;
            this.shopReadyAt = Date.now() + (this.data.shopDelayMs ?? 0);
          }),
        ];
      }
      case SELECTORS.SHOP_SELECT: {
        const key = `${this.district}/${this.taluk}`;
        const broken = (this.data.brokenTaluks ?? []).includes(key);
        const ready = this.taluk !== null && !broken && now >= this.shopReadyAt;
        const shops = ready ? this.talukMap()[this.taluk ?? ""] ?? [] : [];
        return [
          this.select(
            "shop",
            shops.map(shopLabel),
            (label) => {
              this.shop = shops.find((s) => shopLabel(s) === label) ?? null;
            }
          ),
        ];
      }
      case SELECTORS.SEARCH_BUTTON:
        return [
          new FakeNode("search button", "Search", () => [], () => {
            if (this.shop) this.page = "detail";
          }),
        ];
      default:
        return [];
    }
  }

  private dialogFilled(shop: FakeShop): boolean {
    if (this.dialogOpenedAt === null) return false;
    const delay = shop.dialogDelayMs ?? 0;
    return Number.isFinite(delay) && Date.now() >= this.dialogOpenedAt + delay;
  }

  private detailPage(selector: string, shop: FakeShop): FakeNode[] {
    switch (selector) {
      case SELECTORS.DETAIL_ROOT:
        return [textNode("detail root", "")];
      case SELECTORS.STATUS_INDICATOR:
        return shop.status === null ? [] : [textNode("status", shop.status)];
      case SELECTORS.DETAIL_LABEL:
        return Object.entries(shop.details ?? {}).map(
          ([key, value], i) =>
            new FakeNode(`label #${i}`, `${key}:`, (sel) =>
              sel === SELECTORS.LABEL_VALUE ? [textNode(`value #${i}`, value)] : []
            )
        );
      case SELECTORS.VIEW_LINK:
        if (!shop.transaction) return [];
        return [
          new FakeNode("view link", "View", () => [], () => {
            this.dialogOpenedAt = Date.now();
          }),
        ];
      case SELECTORS.TRANSACTION_TABLE:
        return shop.transaction ? [tableNode("transaction table", shop.transaction, SELECTORS.TABLE_BODY_ROW)] : [];
      case SELECTORS.DIALOG: {
        if (this.dialogOpenedAt === null) return [];
        const bill = shop.bill ?? { headers: [], rows: [] };
        return [
          new FakeNode("dialog", "Transactions", (sel) => {
            if (sel === SELECTORS.BILL_TABLE) {
              return [tableNode("bill table", bill, SELECTORS.BILL_DATA_ROW, () => this.dialogFilled(shop))];
            }
            if (sel === SELECTORS.DIALOG_CLOSE) return [this.closeControl()];
            return [];
          }),
        ];
      }
      // a stale close link of some other, hidden dialog
      case SELECTORS.DIALOG_CLOSE:
        return [
          new FakeNode("hidden dialog close", "", () => [], () => {
            throw new ElementNotFoundError(SELECTORS.DIALOG_CLOSE);
          }),
        ];
      default:
        return [];
    }
  }

  private closeControl(): FakeNode {
    return new FakeNode("dialog close", "", () => [], () => {
      if (this.failDialogClose) throw new ElementNotFoundError(SELECTORS.DIALOG_CLOSE);
      this.dialogOpenedAt = null;
      this.dialogCloses += 1;
    });
  }

  private unwrap(element: PortalElement): FakeNode {
    if (!(element instanceof FakeNode)) throw new Error("Foreign element handle");
    return element;
  }

  get dialogOpen(): boolean {
    return this.dialogOpenedAt !== null;
  }

  async navigateTo(_url: string): Promise<void> {
    this.assertAlive();
    this.navigations += 1;
    if (this.crashOnNavigation === this.navigations) {
      this.alive = false;
      throw new SessionLostError("Fake browser crashed");
    }
    this.page = "search";
    this.state = null;
    this.district = null;
    this.taluk = null;
    this.shop = null;
    this.dialogOpenedAt = null;
  }

  async findAll(selector: string, within?: PortalElement): Promise<PortalElement[]> {
    this.assertAlive();
    if (within) return this.unwrap(within).children(selector);
    if (this.page === "search") return this.searchPage(selector);
    if (this.page === "detail" && this.shop) return this.detailPage(selector, this.shop);
    return [];
  }

  async findElement(selector: string, within?: PortalElement): Promise<PortalElement> {
    const all = await this.findAll(selector, within);
    if (all.length === 0) throw new ElementNotFoundError(selector);
    return all[0];
  }

  async click(element: PortalElement): Promise<void> {
    this.assertAlive();
    this.unwrap(element).onClick?.();
  }

  async readText(element: PortalElement): Promise<string> {
    this.assertAlive();
    return this.unwrap(element).text;
  }

  async selectOption(element: PortalElement, label: string): Promise<void> {
    this.assertAlive();
    const node = this.unwrap(element);
    if (!node.onSelect) throw new Error(`${node.description} is not a dropdown`);
    node.onSelect(label);
  }

  async waitUntil<T>(check: Check<T>, timeoutMs: number, description: string): Promise<T> {
    return pollUntil(check, { timeoutMs, intervalMs: 5, description });
  }

  async captureScreenshot(path: string): Promise<void> {
    this.assertAlive();
    this.screenshots.push(path);
  }

  async pageContent(): Promise<string> {
    this.assertAlive();
    return `<html><body data-page="${this.page}"></body></html>`;
  }

  isAlive(): boolean {
    return this.alive;
  }

  async close(): Promise<void> {
    this.alive = false;
  }
}

export const RICE_SHOP: FakeShop = {
  id: "21EB028P1",
  status: "Online",
  details: { "Shop Name": "KARAIKUDI CO-OP STORE", "Shop Code": "21EB028P1" },
  transaction: {
    headers: ["Bill Number", "Transaction Number", "Date & Time", "Amount", "Action"],
    rows: [["B-1001", "T-2001", "01-10-2026 10:15", "15.00", "View"]],
  },
  bill: {
    headers: ["Product Name", "Quantity", "Unit Price", "Total"],
    rows: [["Rice", "5", "3.00", "15.00"]],
  },
};

export function samplePortal(overrides: Partial<FakePortalData> = {}): FakePortalData {
  return {
    districts: {
      SIVAGANGAI: {
        "KARAIKUDI (TK)": [
          RICE_SHOP,
          { id: "21EB030P2", status: "Offline", details: { "Shop Name": "DEVAKOTTAI ROAD" } },
          { id: "21EB031P3", status: null },
        ],
        DEVAKOTTAI: [{ id: "21EB040P1", status: "Online" }],
      },
      MADURAI: {
        "MADURAI NORTH": [{ id: "25AA001P1", status: "Under maintenance" }],
      },
    },
    ...overrides,
  };
}
