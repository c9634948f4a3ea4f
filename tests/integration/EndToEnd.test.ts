import path from 'path';
import { lookup } from 'whois';
import { main } from '../../src/cli';
import { ConfigParseError } from '../../src/errors';

// Mock the whois module
jest.mock('whois', () => ({
  lookup: jest.fn()
}));

const mockWhoisLookup = jest.mocked(lookup);
const fixtures = path.join(__dirname, '..', 'fixtures');

/**
 * End-to-End Tests
 *
 * Drive the command-line entry point against fixture files, with the WHOIS
 * transport replaced in-process.
 */
describe('End-to-End', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    mockWhoisLookup.mockImplementation((domain, _options, callback) => {
      if (domain === 'test.net') {
        callback(null, 'No match for "TEST.NET".');
      } else {
        callback(null, `Domain Name: ${domain.toUpperCase()}`);
      }
    });
  });

  afterEach(() => {
    log.mockRestore();
  });

  test('should print progress then the available domains', async () => {
    await main(['node', 'domain-scout', path.join(fixtures, 'bases.txt'), '--config', path.join(fixtures, 'config.yaml')]);

    expect(log.mock.calls.map(call => call[0])).toEqual([
      'Checking: test.com',
      'Checking: test.net',
      'Checking: example.com',
      'Checking: example.net',
      'Available domains:',
      'test.net'
    ]);
    expect(mockWhoisLookup).toHaveBeenCalledTimes(4);
  });

  test('should treat transport failures as available by default', async () => {
    mockWhoisLookup.mockImplementation((domain, _options, callback) => {
      if (domain.startsWith('example.')) {
        callback(Object.assign(new Error('getaddrinfo ENOTFOUND whois.test'), { code: 'ENOTFOUND' }), '');
      } else {
        callback(null, `Domain Name: ${domain.toUpperCase()}`);
      }
    });

    await main(['node', 'domain-scout', path.join(fixtures, 'bases.txt'), '--config', path.join(fixtures, 'config.yaml')]);

    expect(log.mock.calls.slice(4).map(call => call[0])).toEqual([
      'Available domains:',
      'example.com',
      'example.net'
    ]);
  });

  test('should set transport failures apart with --strict', async () => {
    mockWhoisLookup.mockImplementation((domain, _options, callback) => {
      if (domain === 'example.com') {
        callback(Object.assign(new Error('getaddrinfo ENOTFOUND whois.test'), { code: 'ENOTFOUND' }), '');
      } else {
        callback(null, `Domain Name: ${domain.toUpperCase()}`);
      }
    });

    await main([
      'node', 'domain-scout', path.join(fixtures, 'bases.txt'),
      '--config', path.join(fixtures, 'config.yaml'),
      '--strict'
    ]);

    expect(log.mock.calls.slice(4).map(call => call[0])).toEqual([
      'No available domains found.',
      'Inconclusive domains:',
      'example.com (NETWORK: getaddrinfo ENOTFOUND whois.test)'
    ]);
  });

  test('should reject when the configuration is malformed', async () => {
    await expect(
      main(['node', 'domain-scout', path.join(fixtures, 'bases.txt'), '--config', path.join(fixtures, 'invalid-config.yaml')])
    ).rejects.toBeInstanceOf(ConfigParseError);
    expect(mockWhoisLookup).not.toHaveBeenCalled();
  });
});
