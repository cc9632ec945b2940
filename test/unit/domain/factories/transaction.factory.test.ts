// Unit tests for TransactionFactory and the transaction payload rules
import { TransactionFactory } from '../../../../src/core/domain/factories/transaction.factory';
import { TestUtils } from '../../../helpers/test-utils';

describe('TransactionFactory', () => {
  const owner = { id: 1, username: 'alice' };
  const today = '2024-05-01';

  describe('create', () => {
    it('builds a new transaction owned by the caller', () => {
      const data = TransactionFactory.create(owner, {
        amount: '100.50',
        category: 'income',
        description: 'Freelance payment'
      }, today);

      expect(data).toEqual({
        ownerId: 1,
        amount: '100.50',
        category: 'income',
        description: 'Freelance payment',
        createdDate: today
      });
    });

    it('ignores id, owner, user and date in the payload', () => {
      const data = TransactionFactory.create(owner, {
        id: 99,
        owner: 2,
        user: 2,
        date: '1999-01-01',
        created_date: '1999-01-01',
        amount: 1,
        category: 'expense'
      }, today);

      expect(data).toEqual({
        ownerId: 1,
        amount: '1.00',
        category: 'expense',
        description: null,
        createdDate: today
      });
    });

    it('trims the description and stores blanks as null', () => {
      const input = { amount: '1', category: 'income' };

      expect(TransactionFactory.create(owner, { ...input, description: '  Rent  ' }, today).description).toBe('Rent');
      expect(TransactionFactory.create(owner, { ...input, description: '   ' }, today).description).toBeNull();
      expect(TransactionFactory.create(owner, { ...input, description: null }, today).description).toBeNull();
    });

    it('reports every missing field together', async () => {
      const errors = await TestUtils.fieldErrorsOf(() => TransactionFactory.create(owner, {}, today));

      expect(errors).toEqual({
        amount: ['This field is required.'],
        category: ['This field is required.']
      });
    });

    it('rejects null amount and category', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.create(owner, { amount: null, category: null }, today)
      );

      expect(errors).toEqual({
        amount: ['This field may not be null.'],
        category: ['This field may not be null.']
      });
    });

    it('rejects a category outside income and expense', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.create(owner, { amount: '10', category: 'transfer' }, today)
      );

      expect(errors).toEqual({ category: ['"transfer" is not a valid choice.'] });
    });

    it('rejects amounts with too many decimal places', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.create(owner, { amount: '1.234', category: 'income' }, today)
      );

      expect(errors).toEqual({ amount: ['Ensure that there are no more than 2 decimal places.'] });
    });

    it('rejects amounts that are not numbers', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.create(owner, { amount: true, category: 'income' }, today)
      );

      expect(errors).toEqual({ amount: ['A valid number is required.'] });
    });

    it('rejects a description that is not text', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.create(owner, { amount: '1', category: 'income', description: { text: 'x' } }, today)
      );

      expect(errors).toEqual({ description: ['Not a valid string.'] });
    });

    it('rejects a body that is not an object', async () => {
      expect(await TestUtils.fieldErrorsOf(() => TransactionFactory.create(owner, 'amount=1', today)))
        .toEqual({ non_field_errors: ['Invalid data. Expected a JSON object.'] });
      expect(await TestUtils.fieldErrorsOf(() => TransactionFactory.create(owner, [], today)))
        .toEqual({ non_field_errors: ['Invalid data. Expected a JSON object.'] });
      expect(await TestUtils.fieldErrorsOf(() => TransactionFactory.create(owner, undefined, today)))
        .toEqual({ non_field_errors: ['No data provided.'] });
    });
  });

  describe('changes', () => {
    it('requires amount and category on a full update', async () => {
      const errors = await TestUtils.fieldErrorsOf(() => TransactionFactory.changes({ amount: '5' }, false));

      expect(errors).toEqual({ category: ['This field is required.'] });
    });

    it('leaves the description out of a full update that omits it', () => {
      expect(TransactionFactory.changes({ amount: '5', category: 'income' }, false)).toEqual({
        amount: '5.00',
        category: 'income'
      });
    });

    it('keeps only the supplied fields on a partial update', () => {
      expect(TransactionFactory.changes({ description: 'Groceries' }, true)).toEqual({ description: 'Groceries' });
      expect(TransactionFactory.changes({ description: null }, true)).toEqual({ description: null });
      expect(TransactionFactory.changes({}, true)).toEqual({});
    });

    it('validates the supplied fields on a partial update', async () => {
      const errors = await TestUtils.fieldErrorsOf(() =>
        TransactionFactory.changes({ amount: null, category: 'gift' }, true)
      );

      expect(errors).toEqual({
        amount: ['This field may not be null.'],
        category: ['"gift" is not a valid choice.']
      });
    });

    it('drops immutable fields', () => {
      expect(TransactionFactory.changes({ id: 7, owner: 2, created_date: '2000-01-01' }, true)).toEqual({});
    });
  });
});
