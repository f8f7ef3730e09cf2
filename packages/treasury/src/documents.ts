/**
 * Business Document Composer — Business events as balanced postings.
 *
 * A document with N items becomes one transaction with 2N splits: each
 * item debits its debit account and credits its credit account by the
 * item amount, so the transaction balances for any N.
 *
 * Rules:
 * - Every referenced account and cash-flow type must exist (checked in one batch)
 * - A cash or bank leg must carry a cash-flow type, from the item or the document
 * - Only cash and bank legs are tagged, so the cash-flow statement sees each
 *   movement once
 * - Documents are immutable once posted
 */

import type {
  AccountRecord,
  BusinessDocumentItemRecord,
  BusinessDocumentRecord,
  BusinessDocumentType,
  IsoDate,
} from "@tally/types";
import { compactDate, isAmount, isBusinessDocumentType, isIsoDate } from "@tally/types";
import type { RecordFilter, Table, UnitOfWork } from "@tally/store";
import {
  AccountRegistry,
  CashflowTypeRegistry,
  Ledger,
  ValidationError,
  NotFoundError,
  isPositiveAmount,
  negateAmount,
  normalizeAmount,
  nowTimestamp,
  resolveContext,
  sumAmounts,
} from "@tally/ledger";
import type { EngineContext, EngineOptions, SplitInput } from "@tally/ledger";
import type {
  BusinessDocumentInput,
  DocumentItemInput,
  DocumentQuery,
  DocumentWithItems,
} from "./types.js";

// =============================================================================
// Document numbering
// =============================================================================

export const DOCUMENT_PREFIXES: Readonly<Record<BusinessDocumentType, string>> = {
  sale: "SA",
  purchase: "PO",
  expense: "EX",
  cashflow: "CF",
};

export const DOCUMENT_LABELS: Readonly<Record<BusinessDocumentType, string>> = {
  sale: "Sale",
  purchase: "Purchase",
  expense: "Expense",
  cashflow: "Cash movement",
};

/** "SA-20240305-001" */
export function formatDocumentNumber(type: BusinessDocumentType, date: IsoDate, sequence: number): string {
  return `${DOCUMENT_PREFIXES[type]}-${compactDate(date)}-${String(sequence).padStart(3, "0")}`;
}

// =============================================================================
// Composer
// =============================================================================

export class DocumentComposer {
  private readonly _documents: Table<BusinessDocumentRecord>;
  private readonly _items: Table<BusinessDocumentItemRecord>;
  private readonly _accounts: AccountRegistry;
  private readonly _cashflowTypes: CashflowTypeRegistry;
  private readonly _ledger: Ledger;
  private readonly _context: EngineContext;

  constructor(uow: UnitOfWork, options?: EngineOptions) {
    this._documents = uow.table("documents");
    this._items = uow.table("documentItems");
    this._accounts = new AccountRegistry(uow, options);
    this._cashflowTypes = new CashflowTypeRegistry(uow, options);
    this._ledger = new Ledger(uow, options);
    this._context = resolveContext(options);
  }

  /**
   * Validate a document, post its transaction, and store the document
   * with a back-reference to that transaction.
   */
  async post(type: BusinessDocumentType, input: BusinessDocumentInput): Promise<DocumentWithItems> {
    if (!isBusinessDocumentType(type)) {
      throw new ValidationError("INVALID_INPUT", `Unknown document type: "${String(type)}"`);
    }
    if (!isIsoDate(input.docDate)) {
      throw new ValidationError("INVALID_DATE", `Invalid document date: "${String(input.docDate)}"`, {
        docDate: input.docDate,
      });
    }
    if (input.items.length === 0) {
      throw new ValidationError("EMPTY_DOCUMENT", "A document needs at least one item");
    }
    input.items.forEach(validateItem);

    const accounts = await this._accounts.requireMany(
      input.items.flatMap((item) => [item.debitAccountId, item.creditAccountId]),
    );
    const cashflowTypeIds = [input.cashflowTypeId, ...input.items.map((item) => item.cashflowTypeId)].flatMap(
      (id) => (id !== undefined && id !== null ? [id] : []),
    );
    if (cashflowTypeIds.length > 0) {
      await this._cashflowTypes.requireMany(cashflowTypeIds);
    }

    const label = DOCUMENT_LABELS[type];
    const splits = input.items.flatMap((item, index) =>
      buildSplits(item, index, input, label, accounts),
    );

    const docNo = blankToNull(input.docNo) ?? (await this._nextDocumentNumber(type, input.docDate));
    const posted = await this._ledger.post({
      postDate: input.docDate,
      num: docNo,
      description: blankToNull(input.description) ?? `${label} document`,
      businessType: type,
      referenceNo: input.referenceNo ?? null,
      splits,
    });

    const now = nowTimestamp(this._context);
    const document = await this._documents.insert({
      id: this._context.newId(),
      docType: type,
      docNo,
      docDate: input.docDate,
      partnerName: input.partnerName ?? null,
      referenceNo: input.referenceNo ?? null,
      description: input.description ?? null,
      totalAmount: sumAmounts(input.items.map((item) => item.amount)),
      status: "posted",
      transactionId: posted.transaction.id,
      createdAt: now,
      updatedAt: now,
    });

    const items: BusinessDocumentItemRecord[] = [];
    for (const [index, item] of input.items.entries()) {
      items.push(
        await this._items.insert({
          id: this._context.newId(),
          documentId: document.id,
          lineNo: item.lineNo ?? index + 1,
          description: item.description ?? null,
          memo: item.memo ?? null,
          debitAccountId: item.debitAccountId,
          creditAccountId: item.creditAccountId,
          quantity: item.quantity !== undefined && item.quantity !== null ? normalizeAmount(item.quantity) : null,
          unitPrice: item.unitPrice !== undefined && item.unitPrice !== null ? normalizeAmount(item.unitPrice) : null,
          amount: normalizeAmount(item.amount),
          cashflowTypeId: item.cashflowTypeId ?? input.cashflowTypeId ?? null,
          createdAt: now,
        }),
      );
    }

    return { document, items };
  }

  async get(id: string): Promise<DocumentWithItems | undefined> {
    const document = await this._documents.get(id);
    if (document === undefined) {
      return undefined;
    }
    const items = await this._items.find({ documentId: id }, { orderBy: [{ field: "lineNo" }] });
    return { document, items };
  }

  async require(id: string): Promise<DocumentWithItems> {
    const found = await this.get(id);
    if (found === undefined) {
      throw new NotFoundError("DOCUMENT_NOT_FOUND", `Business document not found: "${id}"`, { id });
    }
    return found;
  }

  /** Newest document date first, then document number descending. */
  async list(query: DocumentQuery = {}): Promise<readonly BusinessDocumentRecord[]> {
    const filter: RecordFilter<BusinessDocumentRecord> = {
      ...(query.type !== undefined ? { docType: query.type } : {}),
      ...(query.from !== undefined || query.to !== undefined
        ? {
            docDate: {
              ...(query.from !== undefined ? { gte: query.from } : {}),
              ...(query.to !== undefined ? { lte: query.to } : {}),
            },
          }
        : {}),
    };
    return this._documents.find(filter, {
      orderBy: [
        { field: "docDate", direction: "desc" },
        { field: "docNo", direction: "desc" },
      ],
    });
  }

  /**
   * Count same-type, same-date documents and add one. If that number is
   * already taken the sequence moves on until a free one is found.
   */
  private async _nextDocumentNumber(type: BusinessDocumentType, date: IsoDate): Promise<string> {
    let sequence = (await this._documents.count({ docType: type, docDate: date })) + 1;
    let candidate = formatDocumentNumber(type, date, sequence);
    while ((await this._documents.count({ docNo: candidate })) > 0) {
      sequence += 1;
      candidate = formatDocumentNumber(type, date, sequence);
    }
    return candidate;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function blankToNull(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

function validateItem(item: DocumentItemInput, index: number): void {
  if (!isAmount(item.amount) || !isPositiveAmount(item.amount)) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Item ${String(index + 1)} amount must be a positive decimal, got "${String(item.amount)}"`,
      { index },
    );
  }
  for (const [field, value] of [["quantity", item.quantity], ["unitPrice", item.unitPrice]] as const) {
    if (value !== undefined && value !== null && !isAmount(value)) {
      throw new ValidationError("INVALID_AMOUNT", `Item ${String(index + 1)} ${field} is not a decimal: "${value}"`, {
        index,
        field,
      });
    }
  }
}

function buildSplits(
  item: DocumentItemInput,
  index: number,
  input: BusinessDocumentInput,
  label: string,
  accounts: ReadonlyMap<string, AccountRecord>,
): SplitInput[] {
  const memo = item.memo ?? input.description ?? `${label} line`;
  const cashflowTypeId = item.cashflowTypeId ?? input.cashflowTypeId ?? null;

  const legs: [string, string][] = [
    [item.debitAccountId, item.amount],
    [item.creditAccountId, negateAmount(item.amount)],
  ];

  return legs.map(([accountId, amount]) => {
    const account = accounts.get(accountId);
    const isCash = account?.isCash ?? false;
    if (isCash && cashflowTypeId === null) {
      throw new ValidationError(
        "CASHFLOW_TYPE_REQUIRED",
        `Cash account "${account?.name ?? accountId}" on line ${String(item.lineNo ?? index + 1)} needs a cash-flow type`,
        { accountId, lineNo: item.lineNo ?? index + 1 },
      );
    }
    return { accountId, amount, memo, cashflowTypeId: isCash ? cashflowTypeId : null };
  });
}
