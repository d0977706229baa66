/**
 * LocalGitModule Tests
 *
 * execCommand is replaced by a jest.fn, so no git process is spawned.
 */

import { LocalGitModule, CHANGELOG_LOG_FORMAT } from './local_git_module';
import { GitCommandError } from '../errors';
import type { ExecOptions, ExecResult } from '../../command_runner';

function createExecMock(result: ExecResult) {
  return jest.fn<Promise<ExecResult>, [string, string[], ExecOptions?]>().mockResolvedValue(result);
}

describe('LocalGitModule', () => {
  describe('getChangelogLog', () => {
    it('WHEN invoked THE SYSTEM SHALL run git log with the changelog format in the source tree', async () => {
      const execCommand = createExecMock({ exitCode: 0, stdout: '', stderr: '' });
      const git = new LocalGitModule({ execCommand });

      await git.getChangelogLog({ repoPath: '/src/runc', since: '2022-01-05 00:00:00' });

      expect(execCommand).toHaveBeenCalledWith(
        'git',
        ['log', '--after=2022-01-05 00:00:00', '--format=* %cd %aN<%ae> %n- %s%d%n', '--date=local'],
        { cwd: '/src/runc' }
      );
    });

    it('WHEN git succeeds THE SYSTEM SHALL return stdout untouched', async () => {
      const stdout = '* Wed Jan 5 10:00:00 2022 Jane Doe<jane@example.com> \n- fix build (HEAD -> main)\n\n';
      const git = new LocalGitModule({ execCommand: createExecMock({ exitCode: 0, stdout, stderr: '' }) });

      await expect(git.getChangelogLog({ repoPath: '/src/runc', since: '2022-01-05' })).resolves.toBe(stdout);
    });

    it('WHEN git fails THE SYSTEM SHALL throw GitCommandError with stderr and the command line', async () => {
      const git = new LocalGitModule({
        execCommand: createExecMock({ exitCode: 128, stdout: '', stderr: 'fatal: not a git repository' }),
      });

      const error = await git.getChangelogLog({ repoPath: '/tmp/empty', since: '2022-01-05' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitCommandError);
      if (!(error instanceof GitCommandError)) return;
      expect(error.message).toBe('Failed to read history of /tmp/empty');
      expect(error.stderr).toBe('fatal: not a git repository');
      expect(error.exitCode).toBe(128);
      expect(error.command).toBe(`git log --after=2022-01-05 "--format=${CHANGELOG_LOG_FORMAT}" --date=local`);
    });

    it('should use the configured git binary', async () => {
      const execCommand = createExecMock({ exitCode: 0, stdout: '', stderr: '' });
      const git = new LocalGitModule({ execCommand, gitBinary: '/usr/local/bin/git' });

      await git.getChangelogLog({ repoPath: '/src/runc', since: '2022-01-05' });

      expect(execCommand.mock.calls[0]?.[0]).toBe('/usr/local/bin/git');
    });
  });

  describe('isRepository', () => {
    it('should return true when rev-parse reports a work tree', async () => {
      const execCommand = createExecMock({ exitCode: 0, stdout: 'true\n', stderr: '' });
      const git = new LocalGitModule({ execCommand });

      await expect(git.isRepository('/src/runc')).resolves.toBe(true);
      expect(execCommand).toHaveBeenCalledWith('git', ['rev-parse', '--is-inside-work-tree'], { cwd: '/src/runc' });
    });

    it('should return false when rev-parse fails', async () => {
      const git = new LocalGitModule({
        execCommand: createExecMock({ exitCode: 128, stdout: '', stderr: 'fatal: not a git repository' }),
      });

      await expect(git.isRepository('/tmp')).resolves.toBe(false);
    });

    it('should return false inside a bare repository', async () => {
      const git = new LocalGitModule({ execCommand: createExecMock({ exitCode: 0, stdout: 'false\n', stderr: '' }) });

      await expect(git.isRepository('/srv/git/runc.git')).resolves.toBe(false);
    });
  });
});
