import { StoreConstraintError, StoreUnavailableException } from '@core/database';
import { describeMissingReference, translateStoreError } from './store-error.util';
import { CatalogConflictException, FailedPreconditionException } from './catalog.exception';

describe('translateStoreError', () => {
  const capture = (error: unknown): unknown => {
    try {
      translateStoreError(error, 'Duplicate.');
    } catch (thrown) {
      return thrown;
    }
    throw new Error('translateStoreError returned');
  };

  it('should turn a unique violation into a conflict with the given message', () => {
    const thrown = capture(new StoreConstraintError('unique', 'departments', 'duplicate key'));

    expect(thrown).toBeInstanceOf(CatalogConflictException);
    expect(thrown).toMatchObject({ message: 'Duplicate.' });
  });

  it('should name the missing location from the foreign key detail', () => {
    const thrown = capture(
      new StoreConstraintError(
        'foreign_key',
        'jobs',
        'insert or update on table "jobs" violates foreign key constraint "jobs_location_id_fkey"',
        'Key (location_id)=(7) is not present in table "locations".',
      ),
    );

    expect(thrown).toBeInstanceOf(FailedPreconditionException);
    expect(thrown).toMatchObject({
      message: 'Location with ID 7 does not exist.',
      details: { reasons: ['Location with ID 7 does not exist.'] },
    });
  });

  it('should fall back to a general message when the detail is missing', () => {
    const thrown = capture(new StoreConstraintError('foreign_key', 'jobs', 'violates foreign key'));

    expect(thrown).toBeInstanceOf(FailedPreconditionException);
    expect(thrown).toMatchObject({
      message: 'A referenced location or department does not exist.',
    });
  });

  it('should rethrow anything that is not a constraint error', () => {
    const outage = new StoreUnavailableException();

    expect(capture(outage)).toBe(outage);
  });
});

describe('describeMissingReference', () => {
  it('should name the missing department', () => {
    expect(
      describeMissingReference('Key (department_id)=(12) is not present in table "departments".'),
    ).toBe('Department with ID 12 does not exist.');
  });

  it('should ignore unknown columns and unrelated details', () => {
    expect(describeMissingReference('Key (owner_id)=(3) is not present in table "owners".')).toBeNull();
    expect(describeMissingReference('something else')).toBeNull();
    expect(describeMissingReference(undefined)).toBeNull();
  });
});
