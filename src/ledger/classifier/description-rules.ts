import { EventDetails, EventKind } from '../entities/ledger-event.entity';
import { parseExportDate, PURCHASE_DATE_LAYOUTS } from './dates';

export type Direction = 'credit' | 'debit';

export type TransactionCategory =
  | 'IPO'
  | 'BONUS'
  | 'RIGHTS'
  | 'MERGER'
  | 'REARRANGEMENT'
  | 'DEMAT'
  | 'REGULAR';

export interface DescriptionRule {
  category: TransactionCategory;
  pattern: RegExp;
  credit?: EventKind;        // kind for a credit row; absent means unsupported
  debit?: EventKind;
}

/**
 * Ordered classification rules, checked first to last against the
 * upper-cased description. The first match wins, so the richer corporate
 * action keywords come before the generic trade markers.
 */
export const DESCRIPTION_RULES: readonly DescriptionRule[] = [
  { category: 'IPO', pattern: /INITIAL PUBLIC OFFERING|\bIPO\b/, credit: EventKind.IPO },
  { category: 'BONUS', pattern: /\bBONUS\b/, credit: EventKind.BONUS },
  { category: 'RIGHTS', pattern: /\bRIGHTS?\b/, credit: EventKind.RIGHTS },
  { category: 'MERGER', pattern: /\bMERGER\b/, credit: EventKind.MERGER_IN, debit: EventKind.MERGER_OUT },
  { category: 'REARRANGEMENT', pattern: /\bREARRANGEMENT\b/, credit: EventKind.REARRANGEMENT },
  { category: 'DEMAT', pattern: /^DEMAT\b/, debit: EventKind.DEMAT },
  {
    category: 'REGULAR',
    pattern: /^ON-(CR|DR)\b|\b(BUY|SELL|PURCHASE|SALE)\b/,
    credit: EventKind.BUY,
    debit: EventKind.SELL,
  },
];

// Unmatched descriptions are imported as regular trades.
export const FALLBACK_RULE: DescriptionRule = {
  category: 'REGULAR',
  pattern: /.*/,
  credit: EventKind.BUY,
  debit: EventKind.SELL,
};

export interface RuleMatch {
  rule: DescriptionRule;
  matched: boolean;
}

export function matchDescription(description: string): RuleMatch {
  const text = description.trim().toUpperCase();
  const rule = DESCRIPTION_RULES.find((candidate) => candidate.pattern.test(text));
  return rule ? { rule, matched: true } : { rule: FALLBACK_RULE, matched: false };
}

/**
 * Direction stated by the description itself, used when the export has a
 * single unsigned quantity column.
 */
export function statedDirection(description: string): Direction | undefined {
  const text = description.trim().toUpperCase();
  if (/^ON-DR\b|\b(SELL|SALE)\b|\bDB\b/.test(text)) return 'debit';
  if (/^ON-CR\b|\b(BUY|PURCHASE)\b|\bCR\b/.test(text)) return 'credit';
  return undefined;
}

/**
 * Pulls reference ids, trade tokens, corporate-action rates and the original
 * purchase date out of a description.
 *
 * Formats seen in exports:
 *   INITIAL PUBLIC OFFERING 00000389 IPO-2080 CREDIT
 *   CA-Bonus 00009458 B-6.5%-2023-24 CREDIT
 *   CA-Rearrangement 00009000 PUR 09-04-2025 CREDIT
 *   ON-CR TD:194105 TX:293297 1301020000003172 SET:1211002025185
 *   Demat 01515373 Close - Cr Confirmed Balance
 */
export function parseDescriptionDetails(description: string, category: TransactionCategory): EventDetails {
  const words = description.trim().split(/\s+/).filter((word) => word !== '');
  const details: EventDetails = {};

  if (category === 'IPO' && /^INITIAL PUBLIC OFFERING/i.test(description.trim())) {
    if (words.length > 3) details.referenceId = words[3];
  } else if (category === 'DEMAT') {
    if (words.length > 1) details.dematId = words[1];
  } else if (category !== 'REGULAR' && words.length > 1) {
    details.referenceId = words[1];
  }

  for (const word of words) {
    if (word.startsWith('TD:')) details.tradeId = word.slice(3);
    else if (word.startsWith('TX:')) details.transactionId = word.slice(3);
    else if (word.startsWith('SET:')) details.settlementCode = word.slice(4);
    else if (word.startsWith('B-') && word.includes('%')) details.bonusRate = word;
    else if (word.startsWith('R-') && word.includes('%')) details.rightsRate = word;
  }

  const purchase = /\bPUR\s+(\S+)/i.exec(description);
  const purchaseDate = purchase ? parseExportDate(purchase[1], PURCHASE_DATE_LAYOUTS) : undefined;
  if (purchaseDate) {
    details.purchaseDate = purchaseDate;
  }

  return details;
}
