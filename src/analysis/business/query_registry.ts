import type { Track } from "../domain/types";

export interface NamedQuery {
  id: string;
  text: string;
}

const FINANCIAL_QUERIES: readonly NamedQuery[] = [
  {
    id: "income_statement",
    text: "Income statement: total revenue, year-over-year revenue growth, gross profit and gross margin, operating income and operating margin, EBITDA and EBITDA margin for the current and prior year",
  },
  {
    id: "balance_sheet",
    text: "Balance sheet: inventories, days inventory outstanding, cost of goods sold, working capital",
  },
  {
    id: "cash_flow_investment",
    text: "Cash flow statement: operating cash flow, free cash flow, capital expenditures and purchases of property and equipment, research and development expenses",
  },
  {
    id: "narrative_trends",
    text: "Management discussion and analysis: year-over-year trends in revenue, margins, cash generation, investment and inventory levels",
  },
];

const SUSTAINABILITY_QUERIES: readonly NamedQuery[] = [
  {
    id: "ghg_emissions",
    text: "Scope 1, Scope 2, and Scope 3 greenhouse gas emissions with numeric values and year-on-year changes",
  },
  {
    id: "automotive_transition",
    text: "EV production percentages, battery recycling rates, ICE phase-out dates, supply chain traceability",
  },
  {
    id: "quality_compliance",
    text: "Sustainability claims, net-zero commitments, water usage, hazardous waste, regulatory fines, recalls, supplier audits",
  },
];

/**
 * Fixed retrieval queries per track, in the order their results are joined.
 */
export function queriesFor(track: Track): readonly NamedQuery[] {
  return track === "financial" ? FINANCIAL_QUERIES : SUSTAINABILITY_QUERIES;
}
