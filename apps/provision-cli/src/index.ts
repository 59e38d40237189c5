/**
 * idp-provision
 *
 * Commands:
 *   idp-provision wait-ready                  Poll a URL until it is up
 *   idp-provision authentik oidc-provider     OAuth2 provider and application
 *   idp-provision authentik enforce-2fa       TOTP enrolment for users without MFA
 *   idp-provision authentik invitation-flow   Invitation-only enrolment
 *   idp-provision authentik recovery-flow     Report the recovery flow
 *   idp-provision zitadel oidc-app            OIDC web application
 *   idp-provision zitadel machine-user        Automation user with a JSON key
 *   idp-provision zitadel bootstrap-token     Automation user with a token
 *   idp-provision zitadel setup-automation    SSO project ownership
 *   idp-provision zitadel admin-token         Admin access token
 *
 * Every run prints one JSON document on standard output and logs on
 * standard error. Exit code 0 on success, 1 on failure.
 */

import { runProgram } from './program.js';

await runProgram(process.argv.slice(2), {
  env: process.env,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
});
