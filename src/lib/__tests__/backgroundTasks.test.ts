import { describe, expect, it } from 'vitest'
import { createTransitionHandler } from '../backgroundTasks'
import { RELAY_PORT_NAME } from '../constants'
import { notificationIdFor } from '../notifications'
import { PortRegistry, RelayReceiver } from '../relay'
import { FakeNotificationTray, flushRelay } from './fakes'

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z')

function setup(options: { listening?: boolean } = {}) {
  const tray = new FakeNotificationTray()
  const registry = new PortRegistry()
  const messages: unknown[] = []
  if (options.listening ?? true) {
    const receiver = new RelayReceiver()
    receiver.listen((message) => messages.push(message))
    registry.register(RELAY_PORT_NAME, receiver)
  }
  const handler = createTransitionHandler({
    createNotificationChannel: tray.createChannel,
    portRegistry: registry,
    now: fixedNow,
  })
  return { tray, registry, messages, handler }
}

describe('transition handler', () => {
  it('notifies and relays an enter transition', async () => {
    const { tray, messages, handler } = setup()

    await handler([{ geofenceKey: 'a::Home', eventKind: 'enter' }])
    await flushRelay()

    expect(tray.shown).toHaveLength(1)
    expect(tray.shown[0].title).toBe('Entered: Home')
    expect(tray.shown[0].body).toBe('Geofence enter detected.')
    expect(tray.shown[0].id).toBe(notificationIdFor('a::Home', 'enter'))
    expect(tray.shown[0].details.android.channelId).toBe('nearby_alerts')
    expect(messages).toEqual([
      { geofenceKey: 'a::Home', kind: 'enter', timestamp: '2026-01-02T03:04:05.000Z' },
    ])
  })

  it('titles exits with the display name', async () => {
    const { tray, handler } = setup()

    await handler([{ geofenceKey: 'b::Work: north', eventKind: 'exit' }])

    expect(tray.shown[0].title).toBe('Exited: Work: north')
    expect(tray.shown[0].body).toBe('Geofence exit detected.')
  })

  it('ignores dwell events', async () => {
    const { tray, messages, handler } = setup()

    await handler([{ geofenceKey: 'a::Home', eventKind: 'dwell' }])
    await flushRelay()

    expect(tray.channelsCreated).toBe(0)
    expect(tray.shown).toEqual([])
    expect(messages).toEqual([])
  })

  it('still notifies when nobody is listening', async () => {
    const { tray, registry, handler } = setup({ listening: false })

    await expect(handler([{ geofenceKey: 'a::Home', eventKind: 'enter' }])).resolves.toBeUndefined()

    expect(tray.shown).toHaveLength(1)
    expect(registry.lookup(RELAY_PORT_NAME)).toBeUndefined()
  })

  it('finishes the batch when the relay port throws', async () => {
    const { tray, registry, handler } = setup({ listening: false })
    const attempts: unknown[] = []
    registry.register(RELAY_PORT_NAME, {
      send: (message) => {
        attempts.push(message)
        throw new Error('port gone')
      },
    })

    await expect(
      handler([
        { geofenceKey: 'a::Home', eventKind: 'enter' },
        { geofenceKey: 'b::Work', eventKind: 'exit' },
      ]),
    ).resolves.toBeUndefined()

    expect(tray.shown.map((n) => n.title)).toEqual(['Entered: Home', 'Exited: Work'])
    expect(attempts).toEqual([
      { geofenceKey: 'a::Home', kind: 'enter', timestamp: '2026-01-02T03:04:05.000Z' },
      { geofenceKey: 'b::Work', kind: 'exit', timestamp: '2026-01-02T03:04:05.000Z' },
    ])
  })

  it('overwrites the notification on redelivery', async () => {
    const { tray, messages, handler } = setup()

    await handler([{ geofenceKey: 'a::Home', eventKind: 'enter' }])
    await handler([{ geofenceKey: 'a::Home', eventKind: 'enter' }])
    await flushRelay()

    expect(tray.shown).toHaveLength(2)
    expect(tray.visible.size).toBe(1)
    expect(messages).toHaveLength(2)
  })

  it('keeps enter and exit notifications apart', async () => {
    const { tray, handler } = setup()

    await handler([
      { geofenceKey: 'a::Home', eventKind: 'enter' },
      { geofenceKey: 'a::Home', eventKind: 'exit' },
    ])

    expect(tray.visible.size).toBe(2)
    expect(notificationIdFor('a::Home', 'exit')).toBe(notificationIdFor('a::Home', 'enter') ^ 1)
  })

  it('relays even when the notification fails', async () => {
    const { tray, messages, handler } = setup()
    tray.failShow = true

    await handler([{ geofenceKey: 'a::Home', eventKind: 'exit' }])
    await flushRelay()

    expect(tray.shown).toEqual([])
    expect(messages).toEqual([
      { geofenceKey: 'a::Home', kind: 'exit', timestamp: '2026-01-02T03:04:05.000Z' },
    ])
  })

  it('creates its own channel on every invocation', async () => {
    const { tray, handler } = setup()

    await handler([{ geofenceKey: 'a::Home', eventKind: 'enter' }])
    await handler([{ geofenceKey: 'a::Home', eventKind: 'exit' }])

    expect(tray.channelsCreated).toBe(2)
  })

  it('uses a key without separator as the name', async () => {
    const { tray, handler } = setup()

    await handler([{ geofenceKey: 'legacy', eventKind: 'enter' }])

    expect(tray.shown[0].title).toBe('Entered: legacy')
  })
})
