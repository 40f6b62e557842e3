import { HoldingType } from '../common/enums';

/**
 * A position in one symbol. `costBasis` is the total amount paid, not a unit price.
 */
export interface IHolding {
  id: number;
  type: HoldingType;
  symbol: string;
  quantity: number;
  costBasis: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateHoldingInput {
  type: HoldingType;
  symbol: string;
  quantity: number;
  costBasis: number;
}

export interface UpdateHoldingInput {
  quantity?: number;
  costBasis?: number;
}

/**
 * Row shape of the holdings table
 */
export interface HoldingRow {
  id: number;
  type: HoldingType;
  symbol: string;
  quantity: string | number;
  cost_basis: string | number;
  created_at: Date;
  updated_at: Date;
}
