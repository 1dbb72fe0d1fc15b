import { RemoteShellAction } from './remote-shell';
import { SSHAccessAction } from './ssh-access';
import { ValidationError } from '../lib/sanitization';

export * from './remote-action';
export * from './remote-shell';
export * from './ssh-access';

export type AnyRemoteAction = SSHAccessAction | RemoteShellAction;

/**
 * All actions an agent can call, in registration order
 */
export function createRemoteToolkit(): AnyRemoteAction[] {
  return [new SSHAccessAction(), new RemoteShellAction()];
}

export function getRemoteAction(name: string): AnyRemoteAction {
  const action = createRemoteToolkit().find((a) => a.name === name);
  if (!action) {
    const known = createRemoteToolkit()
      .map((a) => a.name)
      .join(', ');
    throw new ValidationError(`Unknown tool "${name}". Available: ${known}`);
  }
  return action;
}
