import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import type { TagListFlags } from './resolve-tag-list-config'
import type { VersionFlags } from './resolve-version-config'

import { formatSemanticVersion } from '../core/versions/format-semantic-version'
import { prepareGitEnvironment } from '../core/git/prepare-git-environment'
import { updateVersionFiles } from '../core/files/update-version-files'
import { InvalidInputError } from '../core/errors/invalid-input-error'
import { calculateNextVersion } from './commands/calculate-next-version'
import { runBranchOperation } from './commands/run-branch-operation'
import { runCommitOperation } from './commands/run-commit-operation'
import { normalizeBranchOperation } from './normalize-branch-operation'
import { normalizeCommitOperation } from './normalize-commit-operation'
import { normalizeChangelogMode } from './normalize-changelog-mode'
import { normalizeTagOperation } from './normalize-tag-operation'
import { resolveTagListConfig } from './resolve-tag-list-config'
import { resolveVersionConfig } from './resolve-version-config'
import { runTagOperation } from './commands/run-tag-operation'
import { writeActionOutputs } from './write-action-outputs'
import { writeChangelog } from './commands/write-changelog'
import { DEFAULT_CHANGELOG_FILE } from '../core/constants'
import { readActionInput } from './read-action-input'
import { listTags } from './commands/list-tags'
import { parseCommitLimit } from './parse-commit-limit'
import { parseFileList } from './parse-file-list'
import { reportFailure } from './report-failure'
import { pickOption } from './pick-option'
import { version } from '../package.json'
import { pickFlag } from './pick-flag'

/** Options of the `tag` command. */
interface TagFlags extends TagListFlags {
  message?: unknown
  remote?: unknown
  force?: unknown
  ref?: unknown
}

/** Options of the `branch` command. */
interface BranchFlags {
  pattern?: unknown
  remote?: unknown
  force?: unknown
  base?: unknown
}

/** Options of the `commit` command. */
interface CommitFlags {
  allowEmpty?: unknown
  skipHooks?: unknown
  message?: unknown
  author?: unknown
  since?: unknown
  until?: unknown
  limit?: unknown
  path?: unknown
}

/** Options of the `update-files` command. */
interface UpdateFilesFlags {
  keepPrefix?: unknown
}

/** Options of the `changelog` command. */
interface ChangelogFlags {
  repository?: unknown
  content?: unknown
  mode?: unknown
  file?: unknown
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('git-release-actions')

  cli
    .command('next-version', 'Calculate the current and next version from tags')
    .option(
      '--default-version <version>',
      'Version used when no tag matches (default: v0.1.0)',
    )
    .option('--version-prefix <prefix>', 'Version prefix (default: v)')
    .option('--tag-pattern <glob>', 'Glob selecting version tags (default: v*)')
    .option(
      '--ignore-release-branch',
      'Do not take the version from a release/<version> branch',
    )
    .action((options: VersionFlags) =>
      execute('Calculating version...', async spinner => {
        let config = resolveVersionConfig(options)
        await prepareWorkspace()

        let report = await calculateNextVersion(config)
        let current = formatSemanticVersion(report.result.currentVersion)
        let next = formatSemanticVersion(report.result.nextVersion)

        spinner.success(
          `Next version ${pc.green(next)} (current ${pc.yellow(current)}, ` +
            `${pc.yellow(report.result.commitCount)} commits)`,
        )

        if (report.source === 'release-branch') {
          console.info(
            pc.gray(`Using version from release branch ${report.branch}`),
          )
        } else if (report.source === 'default') {
          console.info(
            pc.gray(`No tag matches ${config.tagPattern}, using default`),
          )
        }

        writeActionOutputs({
          commit_count: String(report.result.commitCount),
          current_version: current,
          next_version: next,
        })
      }),
    )

  cli
    .command('tags', 'List tags, filtered and sorted')
    .option('--pattern <glob>', 'Only list tags matching the glob')
    .option('--sort <mode>', 'alphabetic, version or date (default: alphabetic)')
    .option('--version-prefix <prefix>', 'Version prefix (default: v)')
    .action((options: TagListFlags) =>
      execute('Listing tags...', async spinner => {
        let config = resolveTagListConfig(options)
        await prepareWorkspace()

        let tags = await listTags(config)
        spinner.success(`Found ${pc.yellow(tags.length)} tags`)

        writeActionOutputs({ tags: tags.join(',') })
      }),
    )

  cli
    .command('tag [operation] [name]', 'Create, delete, push, check or list tags')
    .option('--message <text>', 'Annotation message for create')
    .option('--ref <revision>', 'Revision to tag on create (default: HEAD)')
    .option('--force', 'Overwrite an existing tag on create and push')
    .option('--remote', 'Also push on create, also delete remotely on delete')
    .option('--pattern <glob>', 'Only list tags matching the glob')
    .option('--sort <mode>', 'alphabetic, version or date (default: alphabetic)')
    .option('--version-prefix <prefix>', 'Version prefix (default: v)')
    .action(
      (
        operationArgument: undefined | string,
        nameArgument: undefined | string,
        options: TagFlags,
      ) =>
        execute('Running tag operation...', async spinner => {
          let operation = normalizeTagOperation(
            pickOption(operationArgument, 'action'),
          )
          let name = pickOption(nameArgument, 'tag_name')
          let list = resolveTagListConfig(options)
          await prepareWorkspace()

          let result = await runTagOperation(operation, {
            message: pickOption(options.message, 'message'),
            remote: pickFlag(options.remote, 'remote'),
            force: pickFlag(options.force, 'force'),
            ref: pickOption(options.ref, 'ref'),
            list,
            name,
          })

          let outputs: Record<string, string> = {
            result: result.succeeded ? 'success' : 'failure',
            tag_exists: String(result.tagExists),
          }
          if (result.tagMessage) {
            outputs['tag_message'] = result.tagMessage
          }
          if (result.tags) {
            outputs['tags'] = result.tags.join(',')
          }

          if (result.succeeded) {
            spinner.success(`Tag ${operation} completed`)
          } else {
            spinner.error(result.reason ?? `Tag ${operation} failed`)
          }

          writeActionOutputs(outputs)

          if (!result.succeeded) {
            process.exit(1)
          }
        }),
    )

  cli
    .command(
      'branch [operation] [name]',
      'Create, delete, check out, push or list branches',
    )
    .option('--base <branch>', 'Start point on create, fallback on delete')
    .option('--force', 'Force delete, checkout and push')
    .option('--remote', 'Also push on create, also delete remotely on delete')
    .option('--pattern <glob>', 'Only list branches matching the glob')
    .action(
      (
        operationArgument: undefined | string,
        nameArgument: undefined | string,
        options: BranchFlags,
      ) =>
        execute('Running branch operation...', async spinner => {
          let operation = normalizeBranchOperation(
            pickOption(operationArgument, 'action'),
          )
          let name = pickOption(nameArgument, 'branch_name')
          await prepareWorkspace()

          let result = await runBranchOperation(operation, {
            pattern: pickOption(options.pattern, 'pattern') || undefined,
            base: pickOption(options.base, 'base_branch'),
            remote: pickFlag(options.remote, 'remote'),
            force: pickFlag(options.force, 'force'),
            name,
          })

          let outputs: Record<string, string> = {
            result: result.succeeded ? 'success' : 'failure',
            current_branch: result.currentBranch,
          }
          if (result.branches) {
            outputs['branches'] = result.branches.join(',')
          }

          if (result.succeeded) {
            spinner.success(`Branch ${operation} completed`)
          } else {
            spinner.error(result.reason ?? `Branch ${operation} failed`)
          }

          writeActionOutputs(outputs)

          if (!result.succeeded) {
            process.exit(1)
          }
        }),
    )

  cli
    .command('commit [operation] [...files]', 'Create, amend or list commits')
    .option('--message <text>', 'Commit message')
    .option('--allow-empty', 'Create the commit even when nothing is staged')
    .option('--skip-hooks', 'Skip the pre-commit and commit-msg hooks')
    .option('--limit <count>', 'Number of commits to list (default: 10)')
    .option('--author <pattern>', 'Only list commits by this author')
    .option('--since <date>', 'Only list commits after this date')
    .option('--until <date>', 'Only list commits before this date')
    .option('--path <path>', 'Only list commits touching this path')
    .action(
      (
        operationArgument: undefined | string,
        fileArguments: string[],
        options: CommitFlags,
      ) =>
        execute('Running commit operation...', async spinner => {
          let operation = normalizeCommitOperation(
            pickOption(operationArgument, 'action'),
          )
          let files =
            fileArguments.length > 0
              ? fileArguments.map(String)
              : parseFileList(readActionInput('files'))
          let limit = parseCommitLimit(pickOption(options.limit, 'limit'))
          await prepareWorkspace()

          let result = await runCommitOperation(operation, {
            list: {
              author: pickOption(options.author, 'author'),
              since: pickOption(options.since, 'since'),
              until: pickOption(options.until, 'until'),
              path: pickOption(options.path, 'path'),
              limit,
            },
            allowEmpty: pickFlag(options.allowEmpty, 'allow_empty'),
            noVerify: pickFlag(options.skipHooks, 'no_verify'),
            message: pickOption(options.message, 'message'),
            files,
          })

          let outputs: Record<string, string> = {
            result: result.succeeded ? 'success' : 'failure',
          }
          if (result.commitHash) {
            outputs['commit_hash'] = result.commitHash
          }
          if (result.commits) {
            outputs['commits'] = JSON.stringify(result.commits)
          }

          if (result.succeeded) {
            spinner.success(`Commit ${operation} completed`)
          } else {
            spinner.error(result.reason ?? `Commit ${operation} failed`)
          }

          writeActionOutputs(outputs)

          if (!result.succeeded) {
            process.exit(1)
          }
        }),
    )

  cli
    .command('update-files [version] [...files]', 'Write a version into files')
    .option('--keep-prefix', 'Write the version with its leading "v"')
    .action(
      (
        versionArgument: undefined | string,
        fileArguments: string[],
        options: UpdateFilesFlags,
      ) =>
        execute('Updating version files...', async spinner => {
          let value = pickOption(versionArgument, 'version')
          if (!value) {
            throw new InvalidInputError('Version is required')
          }

          let files =
            fileArguments.length > 0
              ? fileArguments.map(String)
              : parseFileList(readActionInput('files'))
          let stripPrefix =
            !options.keepPrefix && pickFlag(undefined, 'strip_v_prefix', true)

          let results = await updateVersionFiles(files, value, { stripPrefix })
          let updated = results.filter(result => result.updated)

          for (let result of results) {
            if (!result.updated) {
              console.warn(
                pc.yellow(`⚠️ ${result.file}: ${result.reason ?? 'not updated'}`),
              )
            }
          }

          writeActionOutputs({
            files: JSON.stringify(updated.map(result => result.file)),
          })

          if (updated.length !== results.length) {
            throw new InvalidInputError(
              `Only updated ${updated.length} of ${results.length} files`,
            )
          }

          spinner.success(
            `Updated ${pc.yellow(updated.length)} files to ${pc.green(value)}`,
          )
        }),
    )

  cli
    .command('changelog [version]', 'Write the release section of a changelog')
    .option('--content <markdown>', 'Section body')
    .option('--mode <mode>', 'unreleased or release (default: unreleased)')
    .option('--file <path>', 'Changelog file (default: CHANGELOG.md)')
    .option('--repository <owner/name>', 'Repository used in release links')
    .action((versionArgument: undefined | string, options: ChangelogFlags) =>
      execute('Updating changelog...', async spinner => {
        let value = pickOption(versionArgument, 'version')
        if (!value) {
          throw new InvalidInputError('Version is required')
        }

        let file =
          pickOption(options.file, 'changelog_file') ?? DEFAULT_CHANGELOG_FILE
        let repository =
          pickOption(options.repository, 'repository') ??
          process.env['GITHUB_REPOSITORY']

        await writeChangelog(file, {
          mode: normalizeChangelogMode(pickOption(options.mode, 'mode')),
          notes: pickOption(options.content, 'content') ?? '',
          date: new Date(),
          version: value,
          repository,
        })

        spinner.success(`Updated ${pc.cyan(file)} for ${pc.green(value)}`)
        writeActionOutputs({ changelog_file: file })
      }),
    )

  cli.command('', 'Show help').action(() => {
    cli.outputHelp()
  })

  cli.help().version(version)
  cli.parse()
}

/**
 * Run a command body behind a spinner and turn failures into exit code 1.
 *
 * @param label - Spinner text.
 * @param task - Command body.
 */
async function execute(
  label: string,
  task: (spinner: ReturnType<typeof createSpinner>) => Promise<void>,
): Promise<void> {
  let spinner = createSpinner(label).start()

  try {
    await task(spinner)
  } catch (error) {
    spinner.error('Failed')
    reportFailure(error)
    process.exit(1)
  }
}

/** Trust the checked out workspace when running inside GitHub Actions. */
async function prepareWorkspace(): Promise<void> {
  let workspace = process.env['GITHUB_WORKSPACE']
  if (process.env['GITHUB_ACTIONS'] === 'true' && workspace) {
    await prepareGitEnvironment(workspace)
  }
}
