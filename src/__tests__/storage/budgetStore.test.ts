import * as path from 'path';
import { loadBudgetFile, parseBudgetData } from '../../storage/budgetStore';
import { BudgetValidationError, MalformedInstallmentError } from '../../utils/errors';
import { validDocument } from '../fixtures/documents';

const FIXTURE_FILE = path.join(__dirname, '..', 'fixtures', 'budget.json');

describe('parseBudgetData', () => {
  it('should map the stored document to the domain model', () => {
    const budget = parseBudgetData(validDocument);

    expect(budget.configuration).toEqual({
      baseSalary: 2772.0,
      averageProductivity: 542.4,
      investmentGoalPercent: 0.2,
      holidayRegion: 'SP',
      dailyTransportAllowance: 12.0,
      dailyMealAllowance: 30.0,
    });
    expect(budget.fixedExpenses).toEqual([{ name: 'Aluguel', amount: 1200.0, category: 'Moradia' }]);
    expect(budget.installments).toEqual([{ name: 'Notebook', amount: 300.0, start: '2024-11', end: '2025-02' }]);
  });

  it('should return deeply frozen data', () => {
    const budget = parseBudgetData(validDocument);
    expect(Object.isFrozen(budget)).toBe(true);
    expect(Object.isFrozen(budget.configuration)).toBe(true);
    expect(Object.isFrozen(budget.fixedExpenses)).toBe(true);
    expect(Object.isFrozen(budget.installments[0])).toBe(true);
  });

  it('should raise MalformedInstallmentError naming the installment', () => {
    const doc = {
      ...validDocument,
      parcelamentos: [{ nome: 'Geladeira', valor_parcela: 210, inicio: '2025-06', fim: '2025-01' }],
    };
    expect(() => parseBudgetData(doc)).toThrow(MalformedInstallmentError);
    expect(() => parseBudgetData(doc)).toThrow('Malformed installment "Geladeira": fim: inicio must not be after fim');
  });

  it('should raise MalformedInstallmentError for an unparseable month', () => {
    const doc = {
      ...validDocument,
      parcelamentos: [{ nome: 'TV', valor_parcela: 100, inicio: '2025/01', fim: '2025-03' }],
    };
    expect(() => parseBudgetData(doc)).toThrow('Malformed installment "TV": inicio: Expected a YYYY-MM month');
  });

  it('should raise BudgetValidationError with issue paths for other problems', () => {
    const doc = { ...validDocument, configuracao: { ...validDocument.configuracao, salario_base: -1 } };
    expect.assertions(2);
    try {
      parseBudgetData(doc);
    } catch (error) {
      expect(error).toBeInstanceOf(BudgetValidationError);
      expect(error instanceof BudgetValidationError && error.issues.map((i) => i.path)).toEqual([
        'configuracao.salario_base',
      ]);
    }
  });

  it('should reject non-object input', () => {
    expect(() => parseBudgetData(null)).toThrow(BudgetValidationError);
    expect(() => parseBudgetData('budget')).toThrow(BudgetValidationError);
  });
});

describe('loadBudgetFile', () => {
  it('should read and validate a budget file', () => {
    const budget = loadBudgetFile(FIXTURE_FILE);
    expect(budget.configuration.holidayRegion).toBe('SP');
    expect(budget.configuration.dailyMealAllowance).toBe(0);
    expect(budget.fixedExpenses).toHaveLength(1);
    expect(budget.installments[0].name).toBe('Notebook');
  });

  it('should raise BudgetValidationError for a missing file', () => {
    const missing = path.join(__dirname, 'does-not-exist.json');
    expect(() => loadBudgetFile(missing)).toThrow(BudgetValidationError);
    expect(() => loadBudgetFile(missing)).toThrow(`Failed to read "${missing}"`);
  });
});
