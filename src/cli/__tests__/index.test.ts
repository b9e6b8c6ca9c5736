/**
 * CLI Entry Point Tests
 * Only paths that finish before any request is made
 */

import { main } from '../index';
import { USAGE } from '../args';

const neverAsked = async (): Promise<string> => {
  throw new Error('unexpected prompt');
};

describe('main', () => {
  it('should print usage for --help', async () => {
    await expect(main(['--help'], neverAsked)).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });

  it('should exit 1 on a usage error', async () => {
    await expect(main(['--nav-threshold', '2'], neverAsked)).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error: Navigation threshold must be between 0.0 and 1.0\n'
    );
  });

  it('should exit 1 on an invalid start URL', async () => {
    await expect(main(['example.com'], neverAsked)).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error: Invalid URL "example.com": not an absolute URL. Please use format: https://example.com'
    );
  });

  it('should exit 1 when the prompt gets no URL', async () => {
    const ask = async () => '';
    await expect(main([], ask)).resolves.toBe(1);
  });
});
