import { describe, it, expect } from 'vitest';
import { validateAutomatorName, validateAutomatorUrl, validateListenerPort } from '../setup/wizard.js';

describe('setup wizard validation', () => {
  it('should require an Automator name', () => {
    expect(validateAutomatorName('  ')).toBe('Name is required');
    expect(validateAutomatorName('Studio A')).toBeUndefined();
  });

  it('should accept bare host:port and full URLs', () => {
    expect(validateAutomatorUrl('192.168.1.50:3000')).toBeUndefined();
    expect(validateAutomatorUrl('http://automator.local:3000/')).toBeUndefined();
    expect(validateAutomatorUrl('')).toBe('URL is required');
    expect(validateAutomatorUrl('http://exa mple')).toBe(
      'Invalid URL (e.g. 192.168.1.50:3000 or http://automator.local:3000)',
    );
  });

  it('should validate listener ports', () => {
    const listeners = [{ port: 9001, name: 'Switcher', enabled: true }];

    expect(validateListenerPort('', listeners)).toBe('Port is required');
    expect(validateListenerPort('90a1', listeners)).toBe('Port must be a number');
    expect(validateListenerPort('70000', listeners)).toBe('Port must be between 1 and 65535');
    expect(validateListenerPort('0', listeners)).toBe('Port must be between 1 and 65535');
    expect(validateListenerPort('9001', listeners)).toBe('Port 9001 is already configured');
    expect(validateListenerPort('9002', listeners)).toBeUndefined();
  });
});
