import test from 'ava'
import type {PublishContext} from '../context.js'
import {CommandError, HoistError} from '../errors.js'
import {Step} from '../step.js'
import {failure, skipped, success} from '../step-result.js'
import type {StepResult} from '../types.js'
import {createTestContext} from './helpers.js'

class ThrowingStep extends Step {
  readonly id = 'throwing'
  readonly title = 'Throwing step'

  constructor(context: PublishContext, private readonly error: Error) {
    super(context)
  }

  protected async run(): Promise<StepResult> {
    throw this.error
  }
}

test('success() freezes the result', t => {
  const result = success({id: 'a', title: 'A'}, 42, {stdout: 'done'})
  t.is(result.status, 'success')
  t.is(result.output, 42)
  t.is(result.stdout, 'done')
  t.true(Object.isFrozen(result))
})

test('skipped() keeps the streams it is given', t => {
  const result = skipped({id: 'a', title: 'A'}, {stdout: 'already there'})
  t.deepEqual({...result}, {step: {id: 'a', title: 'A'}, status: 'skipped', stdout: 'already there'})
})

test('failure() substitutes a diagnostic for empty stderr', t => {
  const result = failure({id: 'a', title: 'Step A'}, {stderr: '  ', stdout: 'out'})
  t.is(result.stderr, 'Step A failed without diagnostic output')
  t.is(result.stdout, 'out')
  t.false('code' in result)
})

test('execute() converts expected errors into failure results', async t => {
  const {context, events} = await createTestContext()
  const step = new ThrowingStep(context, new CommandError('gcloud storage cp', 2, '', 'permission denied'))

  const result = await step.execute()

  t.is(result.status, 'failure')
  t.is(result.stderr, 'gcloud storage cp failed with exit code 2: permission denied')
  t.is(result.status === 'failure' ? result.code : undefined, 'COMMAND_FAILED')
  t.deepEqual(events.map(event => event.event), ['STEP_STARTING', 'STEP_FAILED'])
})

test('execute() propagates unexpected errors', async t => {
  const {context} = await createTestContext()

  await t.throwsAsync(async () => new ThrowingStep(context, new TypeError('bug')).execute(), {instanceOf: TypeError})
  await t.throwsAsync(async () => new ThrowingStep(context, new HoistError('DEFECT', 'defect')).execute(), {message: 'defect'})
})

test('notRun() reports a skipped step without running it', async t => {
  const {context, events} = await createTestContext()
  const step = new ThrowingStep(context, new Error('never thrown'))

  const result = step.notRun('Not run: upstream failed.')

  t.is(result.status, 'skipped')
  t.is(result.stdout, 'Not run: upstream failed.')
  t.is(events.length, 1)
  t.like(events[0], {event: 'STEP_SKIPPED', reason: 'Not run: upstream failed.'})
})
