import {
  DataAccessError,
  ExportError,
  InvalidInputError,
  SourceDirectoryError,
  errorMessage,
  getExitCode,
} from './errors';
import { resetLogger } from './logger';

describe('errors', () => {
  it('should map each fatal condition to its exit code', () => {
    expect(getExitCode(InvalidInputError.fromInvalidNumber('--delay', 'x'))).toBe(1);
    expect(getExitCode(DataAccessError.fromLocked('/db'))).toBe(2);
    expect(getExitCode(SourceDirectoryError.fromMissing('/src'))).toBe(3);
    expect(getExitCode(ExportError.fromWriteFailure('/out.json', 'EACCES'))).toBe(4);
  });

  it('should fall back to exit code 1 for anything else', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode('boom')).toBe(1);
  });

  it('should keep instanceof working for subclasses', () => {
    const error = SourceDirectoryError.fromNotDirectory('/src');

    expect(error).toBeInstanceOf(SourceDirectoryError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SourceDirectoryError');
    expect(error.message).toBe('Source path is not a directory: /src');
  });

  it('should omit the hint separator when there is no hint', () => {
    expect(DataAccessError.fromMissingDatabase('/db').message).toBe('Database not found at /db.');
  });

  it('should read messages from any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });

  describe('log', () => {
    afterEach(() => {
      jest.restoreAllMocks();
      resetLogger();
    });

    it('should print the message and keep details for verbose mode', () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

      InvalidInputError.fromInvalidNumber('--delay', 'soon').log();

      expect(errorSpy).toHaveBeenCalledWith('[icloud-backup] ERROR: --delay must be a non-negative number, got: soon');
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
