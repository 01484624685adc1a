import { err, Result } from '../common/result';
import { CompletionClient, CompletionError } from './completion-client';

export class DisabledCompletionClient extends CompletionClient {
  readonly available = false;
  readonly name = 'disabled';

  async generate(): Promise<Result<string, CompletionError>> {
    return err({ reason: 'disabled', message: 'No completion backend is configured' });
  }

  async stream(): Promise<Result<AsyncIterable<string>, CompletionError>> {
    return err({ reason: 'disabled', message: 'No completion backend is configured' });
  }
}
