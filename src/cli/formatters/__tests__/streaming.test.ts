import { describe, it, expect, afterEach } from 'vitest'
import { createEventBus } from '../../../core/event-bus.js'
import { captureOutput } from '../../../../test/helpers/cli.js'
import type { CapturedOutput } from '../../../../test/helpers/cli.js'
import { streamLifecycleEvents } from '../streaming.js'

let output: CapturedOutput | undefined

afterEach(() => {
  output?.restore()
  output = undefined
})

describe('streamLifecycleEvents', () => {
  it('writes one progress line per event for human output', () => {
    const bus = createEventBus()
    output = captureOutput()
    streamLifecycleEvents(bus, 'human')

    bus.emit('gate:stuck', { taskId: 't-1', gateId: 'code_review', revisions: 6 })

    expect(output.stdout()).toBe('  [gate:stuck] taskId=t-1 gateId=code_review revisions=6\n')
  })

  it('writes NDJSON for json output and stops after unsubscribing', () => {
    const bus = createEventBus()
    output = captureOutput()
    const stop = streamLifecycleEvents(bus, 'json')

    bus.emit('sync:succeeded', { taskId: 't-1', system: 'issue_tracker', operation: 'ensure_issue', detail: 'taskgate:t-1' })
    stop()
    bus.emit('task:split', { taskId: 't-1', childTaskIds: ['t-2', 't-3'] })

    const events = output.events()
    expect(events.map((e) => e.event)).toEqual(['sync:succeeded'])
    expect(events[0]?.data).toEqual({
      taskId: 't-1',
      system: 'issue_tracker',
      operation: 'ensure_issue',
      detail: 'taskgate:t-1',
    })
  })
})
