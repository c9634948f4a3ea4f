/**
 * The rest of the suite replaces whois with a mock; this loads the installed package.
 */
describe('whois package', () => {
  test('should load under CommonJS and expose lookup', () => {
    const whois = jest.requireActual<typeof import('whois')>('whois');

    expect(typeof whois.lookup).toBe('function');
  });
});
