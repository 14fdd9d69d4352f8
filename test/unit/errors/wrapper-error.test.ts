/**
 * Error code and WrapperError unit tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  isConfigurationError,
  isExecutionError,
  isLifecycleHookError,
  WrapperError,
  ConfigurationFileMissingError,
  ConfigurationParseError,
  BundleConfigError,
  CommandNotFoundError,
  ExecutableNotFoundError,
  SpawnError,
  StateTransitionError,
  ExecutionError,
  PreRunError,
  PostRunError,
  describeError,
} from '../../../src/errors';

describe('error codes', () => {
  it('should map each code prefix to its category', () => {
    assert.equal(getErrorCategory(ErrorCode.E101_CONFIGURATION_FILE_MISSING), ErrorCategory.CONFIGURATION);
    assert.equal(getErrorCategory(ErrorCode.E104_COMMAND_NOT_FOUND), ErrorCategory.CONFIGURATION);
    assert.equal(getErrorCategory(ErrorCode.E202_SPAWN_FAILURE), ErrorCategory.EXECUTION);
    assert.equal(getErrorCategory(ErrorCode.E302_POST_RUN_FAILURE), ErrorCategory.LIFECYCLE_HOOK);
  });

  it('should provide a message for every code', () => {
    for (const code of Object.values(ErrorCode)) {
      assert.ok(getErrorMessage(code).length > 0, `missing message for ${code}`);
    }
    assert.equal(getErrorMessage(ErrorCode.E201_EXECUTABLE_NOT_FOUND), 'Executable not found');
  });

  it('should classify codes with the category helpers', () => {
    assert.equal(isConfigurationError(ErrorCode.E102_CONFIGURATION_PARSE_ERROR), true);
    assert.equal(isConfigurationError(ErrorCode.E203_EXECUTION_FAILURE), false);
    assert.equal(isExecutionError(ErrorCode.E203_EXECUTION_FAILURE), true);
    assert.equal(isLifecycleHookError(ErrorCode.E301_PRE_RUN_FAILURE), true);
    assert.equal(isLifecycleHookError(ErrorCode.E101_CONFIGURATION_FILE_MISSING), false);
  });
});

describe('WrapperError', () => {
  it('should format the message with code, base message and context', () => {
    const error = new WrapperError(ErrorCode.E202_SPAWN_FAILURE, 'node (EACCES)');
    assert.equal(error.message, '[E202] Failed to spawn process: node (EACCES)');
    assert.equal(error.code, ErrorCode.E202_SPAWN_FAILURE);
    assert.equal(error.category, ErrorCategory.EXECUTION);
    assert.equal(error.context, 'node (EACCES)');
  });

  it('should omit the context separator when there is no context', () => {
    const error = new WrapperError(ErrorCode.E203_EXECUTION_FAILURE);
    assert.equal(error.message, '[E203] Execution failed');
  });

  it('should keep the cause', () => {
    const cause = new Error('boom');
    const error = new SpawnError('x', cause);
    assert.equal(error.cause, cause);
  });

  it('should support instanceof through the subclass chain', () => {
    const error = new ConfigurationFileMissingError('/tmp/missing.json');
    assert.ok(error instanceof ConfigurationFileMissingError);
    assert.ok(error instanceof WrapperError);
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'ConfigurationFileMissingError');
  });
});

describe('WrapperError subclasses', () => {
  it('ConfigurationFileMissingError should carry the path', () => {
    const error = new ConfigurationFileMissingError('/env/a.json');
    assert.equal(error.message, '[E101] Environment file not found: /env/a.json');
    assert.equal(error.filePath, '/env/a.json');
    assert.deepEqual(error.details, { filePath: '/env/a.json' });
  });

  it('ConfigurationParseError should include the reason', () => {
    const error = new ConfigurationParseError('/env/a.yaml', 'invalid YAML (bad indent)');
    assert.equal(error.message, '[E102] Malformed environment file: /env/a.yaml: invalid YAML (bad indent)');
    assert.equal(error.filePath, '/env/a.yaml');
  });

  it('BundleConfigError and CommandNotFoundError should use their codes', () => {
    assert.equal(new BundleConfigError('bundles.json').code, ErrorCode.E103_BUNDLE_CONFIG_INVALID);
    const notFound = new CommandNotFoundError('maya');
    assert.equal(notFound.message, '[E104] Command not found: maya');
    assert.equal(notFound.commandName, 'maya');
  });

  it('ExecutableNotFoundError should quote the executable', () => {
    const error = new ExecutableNotFoundError('tool', 'not found in PATH');
    assert.equal(error.message, "[E201] Executable not found: 'tool' not found in PATH");
    assert.equal(error.executable, 'tool');
  });

  it('ExecutionError should expose the run details', () => {
    const error = new ExecutionError('Process exited with code 2', {
      returnCode: 2,
      timedOut: false,
      command: ['/bin/tool', '-x'],
    });
    assert.equal(error.message, '[E203] Execution failed: Process exited with code 2');
    assert.equal(error.returnCode, 2);
    assert.equal(error.timedOut, false);
    assert.deepEqual(error.command, ['/bin/tool', '-x']);
    assert.equal(error.timeoutMs, undefined);
  });

  it('StateTransitionError should name both states', () => {
    const error = new StateTransitionError('COMPLETED', 'SPAWN_FAILED');
    assert.equal(error.message, '[E204] Invalid state transition: COMPLETED -> SPAWN_FAILED');
    assert.equal(error.category, ErrorCategory.EXECUTION);
    assert.deepEqual(error.details, { from: 'COMPLETED', to: 'SPAWN_FAILED' });
    assert.equal(error.name, 'StateTransitionError');
  });

  it('PreRunError and PostRunError should describe the hook failure', () => {
    const cause = new Error('lock held');
    const pre = new PreRunError(cause);
    assert.equal(pre.message, '[E301] Pre-run operation failed: lock held');
    assert.equal(pre.cause, cause);
    assert.equal(new PostRunError('disk full').message, '[E302] Post-run operation failed: disk full');
  });
});

describe('describeError', () => {
  it('should use the message of an Error and stringify anything else', () => {
    assert.equal(describeError(new TypeError('bad')), 'bad');
    assert.equal(describeError('plain'), 'plain');
    assert.equal(describeError(42), '42');
  });
});
