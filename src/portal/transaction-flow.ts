import { SELECTORS } from "./selectors.js";
import { cellAt, columnIndex, readCells, readHeaders } from "./helpers.js";
import { ExtractionTimeoutError, TimeoutFailureError, errorMessage } from "../core/errors.js";
import { BILL_COLUMNS, BILL_POSITIONAL_LAYOUT, TRANSACTION_COLUMNS } from "../constants.js";
import type { PortalElement, PortalSession } from "../core/portal-session.js";
import type { Logger } from "../core/logger.js";
import type { BillItem, TransactionSummary } from "../types.js";

export interface TransactionSettings {
  dialogTimeoutMs: number;
}

export interface TransactionExtraction {
  lastTransaction: TransactionSummary;
  billItems: BillItem[];
}

interface PopulatedDialog {
  table: PortalElement;
  rows: PortalElement[];
}

async function readTransactionSummary(session: PortalSession): Promise<TransactionSummary> {
  const table = await session.findElement(SELECTORS.TRANSACTION_TABLE);
  const headers = await readHeaders(session, table);
  const rows = await session.findAll(SELECTORS.TABLE_BODY_ROW, table);
  const cells = rows.length > 0 ? await readCells(session, rows[0]) : [];

  return {
    date: cellAt(cells, columnIndex(headers, TRANSACTION_COLUMNS.date)),
    amount: cellAt(cells, columnIndex(headers, TRANSACTION_COLUMNS.amount)),
    reference: cellAt(cells, columnIndex(headers, TRANSACTION_COLUMNS.reference)),
  };
}

/** Map one bill row; missing columns become empty strings so the row is kept. */
export function toBillItem(headers: string[], cells: string[]): BillItem {
  if (headers.length === 0) {
    return {
      itemName: cellAt(cells, BILL_POSITIONAL_LAYOUT.itemName),
      quantity: cellAt(cells, BILL_POSITIONAL_LAYOUT.quantity),
      unitPrice: cellAt(cells, BILL_POSITIONAL_LAYOUT.unitPrice),
      total: cellAt(cells, BILL_POSITIONAL_LAYOUT.total),
    };
  }
  return {
    itemName: cellAt(cells, columnIndex(headers, BILL_COLUMNS.itemName)),
    quantity: cellAt(cells, columnIndex(headers, BILL_COLUMNS.quantity)),
    unitPrice: cellAt(cells, columnIndex(headers, BILL_COLUMNS.unitPrice)),
    total: cellAt(cells, columnIndex(headers, BILL_COLUMNS.total)),
  };
}

async function waitForBillRows(session: PortalSession, timeoutMs: number): Promise<PopulatedDialog> {
  try {
    return await session.waitUntil<PopulatedDialog>(
      async () => {
        const dialog = await session.findElement(SELECTORS.DIALOG);
        const table = await session.findElement(SELECTORS.BILL_TABLE, dialog);
        const rows = await session.findAll(SELECTORS.BILL_DATA_ROW, table);
        return rows.length > 0 ? { table, rows } : null;
      },
      timeoutMs,
      "transaction dialog content"
    );
  } catch (error) {
    if (error instanceof TimeoutFailureError) {
      throw new ExtractionTimeoutError(error.condition, error.timeoutMs);
    }
    throw error;
  }
}

/**
 * Close the bill dialog via its own title-bar control. Never throws: a close
 * failure must not replace what the extraction already produced.
 */
async function closeDialog(session: PortalSession, logger: Logger): Promise<void> {
  try {
    const dialogs = await session.findAll(SELECTORS.DIALOG);
    if (dialogs.length === 0) return;
    const buttons = await session.findAll(SELECTORS.DIALOG_CLOSE, dialogs[0]);
    if (buttons.length === 0) {
      logger.warn("Dialog close control not found; the next page load will discard it");
      return;
    }
    await session.click(buttons[0]);
  } catch (error) {
    logger.warn(`Closing the transaction dialog failed: ${errorMessage(error)}`);
  }
}

/**
 * Open the last-transaction dialog and read its bill. Returns null when the
 * shop has no transaction to open. Throws `ExtractionTimeoutError` when the
 * dialog never fills in.
 */
export async function extractLastTransaction(
  session: PortalSession,
  settings: TransactionSettings,
  logger: Logger
): Promise<TransactionExtraction | null> {
  const links = await session.findAll(SELECTORS.VIEW_LINK);
  if (links.length === 0) {
    logger.info("No last transaction on record");
    return null;
  }

  await session.click(links[0]);
  try {
    const { table, rows } = await waitForBillRows(session, settings.dialogTimeoutMs);
    const lastTransaction = await readTransactionSummary(session);

    const headers = await readHeaders(session, table);
    const billItems: BillItem[] = [];
    for (const row of rows) {
      billItems.push(toBillItem(headers, await readCells(session, row)));
    }
    logger.debug(`Read ${billItems.length} bill items`);
    return { lastTransaction, billItems };
  } finally {
    await closeDialog(session, logger);
  }
}
