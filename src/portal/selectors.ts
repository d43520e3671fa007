// Centralized selectors for the portal's shop search and detail pages.
// Update these when the portal changes its markup.

export const SELECTORS = {
  // ── Language switch ───────────────────────────────────────────────────────
  LANGUAGE_ENGLISH_ACTIVE: "body.lang-english",
  LANGUAGE_ENGLISH_OPTION: "table[id='masterForm:languageSelectMenu'] input[type='radio'][value='en']",

  // ── Search form ───────────────────────────────────────────────────────────
  // JSF ids contain ':' so attribute selectors avoid escaping
  STATE_SELECT: "select[id='fpsReportForm:state']",
  DISTRICT_SELECT: "select[id='fpsReportForm:district']",
  TALUK_SELECT: "select[id='fpsReportForm:taluk']",
  SHOP_SELECT: "select[id='fpsReportForm:fps']",
  SELECT_OPTION: "option",
  SEARCH_BUTTON:
    "[id='fpsReportForm:searchButton'], form[id='fpsReportForm'] button[type='submit'], " +
    "form[id='fpsReportForm'] input[type='submit']",

  // ── Detail page ───────────────────────────────────────────────────────────
  DETAIL_ROOT: ".fps-detail-container",
  STATUS_INDICATOR:
    ".shop-status, .status-indicator, span[class*='status'], div[class*='status']",
  DETAIL_LABEL: ".fps-detail-container label",
  LABEL_VALUE: "xpath=following-sibling::*[1]",

  // ── Last transaction ──────────────────────────────────────────────────────
  VIEW_LINK: "a.link-view, a[onclick*='billItemWidget']",
  // Anchored to the table's own rows so a layout table wrapping it never matches
  TRANSACTION_TABLE:
    "table:has(> tbody > tr a.link-view), table:has(> tbody > tr a[onclick*='billItemWidget'])",
  TABLE_HEADER_CELL: "th",
  TABLE_BODY_ROW: "tbody tr",
  TABLE_CELL: "td",

  // ── Bill dialog ───────────────────────────────────────────────────────────
  DIALOG: "div.ui-dialog:has(span.ui-dialog-title:has-text('Transactions'))",
  BILL_TABLE: "form[id='billForm'] table, table",
  // PrimeFaces renders "No records found." as a placeholder row
  BILL_DATA_ROW: "tbody tr:not(.ui-datatable-empty-message):has(td)",
  // Looked up inside DIALOG; other PrimeFaces dialogs carry hidden close links
  DIALOG_CLOSE: "a.ui-dialog-titlebar-close",
} as const;
