/**
 * Centralized Vitest Setup for pkgstage
 *
 * Secrets registered with the redactor are process-global; reset them between
 * tests so one test's token cannot mask another test's expected output.
 */

import { afterEach } from 'vitest';
import { clearRegisteredSecrets } from './src/security/redaction.js';

delete process.env.PKGSTAGE_DEBUG;

afterEach(() => {
  clearRegisteredSecrets();
});
