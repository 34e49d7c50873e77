export const MODULE_KEY = 'finance';
export const MODULE_NAME = 'Finance';

// Validation
export * from './validation';

// Commands
export { createFiscalYear, updateFiscalYear, deleteFiscalYear, closeFiscalYear } from './commands/fiscal-years';
export { createBudget, updateBudget, submitBudget, reviewBudget, deleteBudget } from './commands/budgets';
export {
  createContribution,
  updateContribution,
  deleteContribution,
  restoreContribution,
} from './commands/contributions';
export { createExpense, updateExpense, deleteExpense, reviewExpense } from './commands/expenses';
export {
  createExpenseCategory,
  updateExpenseCategory,
  deleteExpenseCategory,
} from './commands/expense-categories';

// Queries
export { getFiscalYear, listFiscalYears } from './queries/fiscal-years';
export type { FiscalYearItem } from './queries/fiscal-years';
export { getBudget, listBudgets } from './queries/budgets';
export type { BudgetItem } from './queries/budgets';
export {
  getContribution,
  listContributions,
  getContributionTotal,
  listContributionTypes,
  listPaymentOptions,
} from './queries/contributions';
export type { ContributionItem } from './queries/contributions';
export { getExpense, listExpenses } from './queries/expenses';
export type { ExpenseItem } from './queries/expenses';
export { getExpenseCategory, listExpenseCategories } from './queries/expense-categories';
export { getExpenseReport } from './queries/expense-report';
export type { ExpenseReportLine } from './queries/expense-report';
export {
  getIncomeStatement,
  getBudgetVsActual,
  getContributionSummary,
  getExpenseSummary,
  getBalanceSheet,
} from './queries/reports';
export type { ReportLine, IncomeStatement, BudgetVsActualLine, BalanceSheet } from './queries/reports';
