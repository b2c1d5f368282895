#!/usr/bin/env node
import { or } from '@optique/core/constructs';
import { command } from '@optique/core/primitives';
import { message } from '@optique/core/message';
import { run } from '@optique/run';

import { AclError } from '../errors/acl-error.js';
import { Credential } from '../errors/errors.js';
import { renderError } from './output.js';
import { showCommand, handleShow } from './commands/show.js';
import { permissionsCommand, handlePermissions } from './commands/permissions.js';
import { accessCommand, handleAccess } from './commands/access.js';
import { sharedCommand, handleShared } from './commands/shared.js';
import { inviteCommand, handleInvite } from './commands/invite.js';
import { removePermissionCommand, handleRemovePermission } from './commands/remove-permission.js';
import { stripCommand, handleStrip } from './commands/strip.js';
import { revokeCommand, handleRevoke } from './commands/revoke.js';
import { loginCommand, handleLogin } from './commands/login.js';
import { tokenCommand, handleToken } from './commands/token.js';

// Main parser with all commands
const parser = or(
  command('show', showCommand, { description: message`Audit report of who can access an item and its subfolders` }),
  command('permissions', permissionsCommand, { description: message`List the permissions of one item, with ids` }),
  command('access', accessCommand, { description: message`Find items shared explicitly with a user` }),
  command('shared', sharedCommand, { description: message`Find shared items below a folder` }),
  command('invite', inviteCommand, { description: message`Grant a user access to an item` }),
  command('remove-permission', removePermissionCommand, { description: message`Remove one explicit permission` }),
  command('strip', stripCommand, { description: message`Remove every explicit permission on an item` }),
  command('revoke', revokeCommand, { description: message`Remove a user's explicit access below a folder` }),
  command('login', loginCommand, { description: message`Sign in and store a token with write access` }),
  command('token', tokenCommand, { description: message`Show the available tokens and their capability` }),
);

const result = run(parser, {
  programName: 'acl-inspector',
  version: '0.1.0',
  description: message`Audit and edit OneDrive sharing permissions across a folder tree`,
  help: 'both',
});

(async () => {
  try {
    switch (result.cmd) {
      case 'show':
        await handleShow(result);
        break;
      case 'permissions':
        await handlePermissions(result);
        break;
      case 'access':
        await handleAccess(result);
        break;
      case 'shared':
        await handleShared(result);
        break;
      case 'invite':
        await handleInvite(result);
        break;
      case 'remove-permission':
        await handleRemovePermission(result);
        break;
      case 'strip':
        await handleStrip(result);
        break;
      case 'revoke':
        await handleRevoke(result);
        break;
      case 'login':
        await handleLogin(result);
        break;
      case 'token':
        await handleToken(result);
        break;
    }
  } catch (err) {
    if (AclError.isAclError(err)) {
      console.error(renderError(err.message));
      if (Credential.is(err) && !result.debug) {
        console.error('   Run "acl-inspector token" to see which tokens are available.');
      }
      if (result.debug) console.error(err.prettyPrint({ includeStackTrace: true }));
    } else {
      console.error(err instanceof Error ? err : 'Command failed');
    }
    process.exit(1);
  }
})();
