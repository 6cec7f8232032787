import type { BudgetDescriptor } from '../models/trip.model';

const BUDGET_DESCRIPTORS: Record<number, BudgetDescriptor> = {
  1: 'Budget-Friendly',
  2: 'Mid-Range',
  3: 'Luxury'
};

export const describeBudget = (budgetLevel: number): BudgetDescriptor =>
  BUDGET_DESCRIPTORS[budgetLevel] ?? 'Any Budget';
