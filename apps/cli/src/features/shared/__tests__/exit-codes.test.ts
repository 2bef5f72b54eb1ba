import { afterEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes, exitWithCode } from '../exit-codes.js';

describe('exit-codes', () => {
  describe('ExitCodes', () => {
    it('should define SUCCESS as 0', () => {
      expect(ExitCodes.SUCCESS).toBe(0);
    });

    it('should define error codes', () => {
      expect(ExitCodes.GENERAL_ERROR).toBe(1);
      expect(ExitCodes.INVALID_ARGS).toBe(2);
      expect(ExitCodes.NOT_FOUND).toBe(4);
      expect(ExitCodes.VALIDATION_ERROR).toBe(8);
      expect(ExitCodes.CONFIG_ERROR).toBe(11);
    });

    it('should have unique exit codes', () => {
      const codes = Object.values(ExitCodes);
      expect(new Set(codes).size).toBe(codes.length);
    });
  });

  describe('exitWithCode', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should call process.exit with the given code', () => {
      // Mock process.exit to prevent actual process termination
      const processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
        throw new Error('process.exit called');
      });

      expect(() => exitWithCode(ExitCodes.NOT_FOUND)).toThrow('process.exit called');
      expect(processExitSpy).toHaveBeenCalledWith(4);
    });
  });
});
