import { describe, it, expect } from 'vitest';
import {
  CatalogBackendError,
  CatalogBackendErrorType,
  classifyBackendError,
  renderErrorChain,
} from './backend-error';

function sqliteError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('CatalogBackendError', () => {
  it('keeps the classification and source', () => {
    const source = new Error('connection reset');
    const error = CatalogBackendError.unexpected(source);

    expect(error.type).toBe(CatalogBackendErrorType.Unexpected);
    expect(error.source).toBe(source);
    expect(error.cause).toBe(source);
    expect(error.message).toBe('CatalogBackendError (Unexpected): connection reset');
  });

  it('wraps non-Error sources', () => {
    const error = CatalogBackendError.concurrentModification('row changed');
    expect(error.source).toBeInstanceOf(Error);
    expect(error.source.message).toBe('row changed');
    expect(error.type).toBe(CatalogBackendErrorType.ConcurrentModification);
  });

  describe('render', () => {
    it('renders type and source message without a stack', () => {
      const error = CatalogBackendError.unexpected(new Error('boom'));
      expect(error.render()).toBe('CatalogBackendError (Unexpected): boom\n');
    });

    it('renders the context stack', () => {
      const error = CatalogBackendError.unexpected(new Error('boom')).withDetails(['one', 'two']);
      expect(error.render()).toBe('CatalogBackendError (Unexpected): boom\nStack:\n  one\n  two\n');
    });

    it('renders the cause chain of the source', () => {
      const root = new Error('disk full');
      const middle = new Error('write failed', { cause: root });
      const source = new Error('insert failed', { cause: middle });
      const error = CatalogBackendError.unexpected(source).withDetail('Error creating warehouse in catalog');

      expect(error.render()).toBe(
        'CatalogBackendError (Unexpected): insert failed\n' +
          'Stack:\n  Error creating warehouse in catalog\n' +
          'Caused by:\n' +
          'write failed\n\n' +
          'Caused by:\n\tdisk full\n'
      );
    });

    it('stops at a cause chain that loops back', () => {
      const a = new Error('a');
      const b = new Error('b', { cause: a });
      a.cause = b;
      const error = CatalogBackendError.unexpected(new Error('top', { cause: a }));

      expect(error.render()).toBe(
        'CatalogBackendError (Unexpected): top\n' + 'Caused by:\n' + 'a\n\n' + 'Caused by:\n\tb\n'
      );
    });

    it('does not repeat the source when a cause points back at it', () => {
      const source = new Error('insert failed');
      source.cause = new Error('write failed', { cause: source });

      expect(CatalogBackendError.unexpected(source).render()).toBe(
        'CatalogBackendError (Unexpected): insert failed\n' + 'Caused by:\n' + 'write failed\n\n'
      );
    });

    it('is used by toString', () => {
      const error = CatalogBackendError.concurrentModification(new Error('busy'));
      expect(String(error)).toBe('CatalogBackendError (ConcurrentModification): busy\n');
    });
  });

  describe('equals', () => {
    it('is true for same type, stack and source message', () => {
      const a = CatalogBackendError.unexpected(new Error('x')).withDetail('d');
      const b = CatalogBackendError.unexpected(new Error('x')).withDetail('d');
      expect(a.equals(b)).toBe(true);
    });

    it('is false when the classification differs', () => {
      const a = CatalogBackendError.unexpected(new Error('x'));
      const b = CatalogBackendError.concurrentModification(new Error('x'));
      expect(a.equals(b)).toBe(false);
    });

    it('is false when the stacks differ', () => {
      const a = CatalogBackendError.unexpected(new Error('x')).withDetail('d');
      const b = CatalogBackendError.unexpected(new Error('x'));
      expect(a.equals(b)).toBe(false);
    });

    it('is false when the source messages differ', () => {
      const a = CatalogBackendError.unexpected(new Error('x'));
      const b = CatalogBackendError.unexpected(new Error('y'));
      expect(a.equals(b)).toBe(false);
    });
  });
});

describe('renderErrorChain', () => {
  it('renders a single error', () => {
    expect(renderErrorChain(new Error('only'))).toBe('only\n\n');
  });

  it('renders an error that is its own cause once', () => {
    const error = new Error('loop');
    error.cause = error;
    expect(renderErrorChain(error)).toBe('loop\n\n');
  });

  it('renders non-Error causes', () => {
    expect(renderErrorChain(new Error('top', { cause: 'plain string' }))).toBe(
      'top\n\nCaused by:\n\tplain string\n'
    );
  });
});

describe('classifyBackendError', () => {
  it('classifies SQLITE_BUSY as ConcurrentModification', () => {
    const error = classifyBackendError(sqliteError('database is locked', 'SQLITE_BUSY'));
    expect(error.type).toBe(CatalogBackendErrorType.ConcurrentModification);
    expect(error.source.message).toBe('database is locked');
  });

  it('classifies extended busy and locked codes as ConcurrentModification', () => {
    expect(classifyBackendError(sqliteError('snapshot', 'SQLITE_BUSY_SNAPSHOT')).type).toBe(
      CatalogBackendErrorType.ConcurrentModification
    );
    expect(classifyBackendError(sqliteError('table locked', 'SQLITE_LOCKED_SHAREDCACHE')).type).toBe(
      CatalogBackendErrorType.ConcurrentModification
    );
  });

  it('classifies every other failure as Unexpected', () => {
    expect(classifyBackendError(sqliteError('constraint', 'SQLITE_CONSTRAINT_CHECK')).type).toBe(
      CatalogBackendErrorType.Unexpected
    );
    expect(classifyBackendError(new Error('no code')).type).toBe(CatalogBackendErrorType.Unexpected);
    expect(classifyBackendError('thrown string').type).toBe(CatalogBackendErrorType.Unexpected);
  });

  it('passes backend errors through unchanged', () => {
    const original = CatalogBackendError.concurrentModification(new Error('busy')).withDetail('kept');
    expect(classifyBackendError(original)).toBe(original);
  });
});
