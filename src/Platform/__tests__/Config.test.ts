import { describe, test, expect } from '@jest/globals';
import { DEFAULTS, loadEngineConfig, validateEngineConfig } from '../Config.js';
import { ConfigurationError } from '../Errors.js';

describe('Engine Configuration', () => {
    test('defaults apply when the environment is silent', () => {
        expect(loadEngineConfig({}, { ESCROW_SUPERVISOR: 'root' })).toEqual({ supervisor: 'root', ...DEFAULTS });
    });

    test('environment values are parsed as integers', () => {
        const config = loadEngineConfig({}, {
            ESCROW_SUPERVISOR: 'root',
            ESCROW_RECENT_WINDOW: '25',
            ESCROW_HOLD_DURATION: '7',
            ESCROW_PRESSURE_THRESHOLD: 'not-a-number'
        });
        expect(config.recentWindow).toBe(25);
        expect(config.holdDuration).toBe(7);
        expect(config.pressureThreshold).toBe(DEFAULTS.pressureThreshold);
    });

    test('overrides win over the environment', () => {
        const config = loadEngineConfig({ supervisor: 'ops', maxPriority: 3 }, { ESCROW_SUPERVISOR: 'root', ESCROW_MAX_PRIORITY: '9' });
        expect(config.supervisor).toBe('ops');
        expect(config.maxPriority).toBe(3);
    });

    test('a missing supervisor is rejected', () => {
        expect(() => loadEngineConfig({}, {})).toThrow(ConfigurationError);
    });

    test('issues are listed per field', () => {
        try {
            loadEngineConfig({ supervisor: 'root', multisigQuorum: 5, recentWindow: 0 }, {});
            throw new Error('expected a ConfigurationError');
        } catch (e: unknown) {
            expect(e).toBeInstanceOf(ConfigurationError);
            if (e instanceof ConfigurationError) {
                expect(e.code).toBe('CONFIGURATION_INVALID');
                expect(e.metadata?.issues).toEqual([
                    'recentWindow: Number must be greater than or equal to 1',
                    'multisigQuorum: Number must be less than or equal to 3'
                ]);
            }
        }
    });

    test('validateEngineConfig rejects unknown shapes', () => {
        expect(() => validateEngineConfig({ supervisor: 'root' })).toThrow(ConfigurationError);
        expect(validateEngineConfig({ supervisor: 'root', ...DEFAULTS }).supervisor).toBe('root');
    });
});
