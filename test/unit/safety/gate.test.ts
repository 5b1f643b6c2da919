import { ArgumentConfirmationGate } from '../../../src/safety/gate.js';

describe('ArgumentConfirmationGate', () => {
  it('proceeds without recording anything when confirmed', () => {
    const gate = new ArgumentConfirmationGate(true, 'pkg_install');
    expect(gate.confirm('Install pip?')).toBe('proceed');
    expect(gate.declinedPrompts).toEqual([]);
  });

  it('cancels and records each prompt in order when not confirmed', () => {
    const gate = new ArgumentConfirmationGate(false, 'pkg_install');
    expect(gate.confirm('Install pip?')).toBe('cancel');
    expect(gate.confirm("Uninstall 'requests'?")).toBe('cancel');
    expect(gate.declinedPrompts).toEqual(['Install pip?', "Uninstall 'requests'?"]);
  });
});
