import { describe, expect, it } from 'vitest'
import { createNearbyAlerts } from '../bootstrap'
import { RELAY_PORT_NAME } from '../constants'
import { PortRegistry, RelayReceiver } from '../relay'
import { selectIsInside } from '../../stores/monitorStore'
import type { AppConfig } from '../config'
import type { LocationAccuracyStatus } from '../permissions'
import {
  FakeGeofenceService,
  FakeNotificationTray,
  FakePermissionSubsystem,
  FakePositionProvider,
  flushRelay,
  inlineTargetSource,
} from './fakes'

const testConfig: AppConfig = {
  environment: 'test',
  targetsPath: 'unused.json',
  sentryDsn: null,
  notificationResponsivenessMs: 60_000,
  distanceFilterMeters: 10,
  logToConsole: false,
}

const HOME = '[{"id":"a","name":"Home","latitude":10,"longitude":20,"radiusMeters":100}]'
const HOME_AND_WORK =
  '[{"id":"a","name":"Home","latitude":10,"longitude":20},{"id":"b","name":"Work","latitude":11,"longitude":21}]'

function setup(options: { targets?: string; accuracy?: LocationAccuracyStatus } = {}) {
  const geofences = new FakeGeofenceService()
  const permissions = new FakePermissionSubsystem(options.accuracy ?? 'precise')
  const positions = new FakePositionProvider()
  const tray = new FakeNotificationTray()
  const registry = new PortRegistry()
  const app = createNearbyAlerts(
    {
      permissions,
      geofences,
      positions,
      createNotificationChannel: tray.createChannel,
      targetSource: inlineTargetSource(options.targets ?? HOME),
    },
    {
      config: testConfig,
      portRegistry: registry,
      now: () => new Date('2026-01-02T03:04:05.000Z'),
    },
  )
  return { app, geofences, permissions, positions, tray, registry }
}

describe('createNearbyAlerts.initialize', () => {
  it('registers saved places and starts the live position', async () => {
    const { app, geofences, positions, tray, registry } = setup()

    await app.initialize()

    const state = app.store.getState()
    expect(geofences.calls).toEqual(['initialize', 'clearAll', 'register:a::Home', 'listActive'])
    expect(state.status).toBe('Registered 1 geofences.')
    expect(state.geofencesRegistered).toBe(true)
    expect(state.permissionStatus).toBe('Location: always • Notifications: granted')
    expect(state.targets.map((t) => t.id)).toEqual(['a'])
    expect(state.position).toEqual({ latitude: 10, longitude: 20, accuracy: 5, timestamp: 0 })
    expect(positions.activeWatchers).toHaveLength(1)
    expect(registry.lookup(RELAY_PORT_NAME)).toBeInstanceOf(RelayReceiver)
    expect(tray.channelsCreated).toBe(1)
  })

  it('turns a background transition into foreground state', async () => {
    const { app, geofences, tray } = setup()
    await app.initialize()

    await geofences.fire('a::Home', 'enter')
    await flushRelay()

    const state = app.store.getState()
    expect(tray.shown.map((n) => n.title)).toEqual(['Entered: Home'])
    expect(selectIsInside(state, 'a::Home')).toBe(true)
    expect(state.lastEventSummary).toBe('enter: Home @ 2026-01-02T03:04:05.000Z')
  })

  it('does not move the inside flag from position updates', async () => {
    const { app, positions } = setup()
    await app.initialize()

    positions.emit({ latitude: 10, longitude: 20, accuracy: 1, timestamp: 2 })

    expect(app.store.getState().position?.timestamp).toBe(2)
    expect(selectIsInside(app.store.getState(), 'a::Home')).toBe(false)
  })

  it('asks for background permission before registering', async () => {
    const { app, geofences, permissions, positions } = setup()
    permissions.statuses.locationAlways = 'denied'

    await app.initialize()

    expect(app.store.getState().status).toBe(
      'Background geofences need "Allow all the time" location permission.',
    )
    expect(app.store.getState().geofencesRegistered).toBe(false)
    expect(geofences.calls).toEqual(['initialize'])
    expect(positions.activeWatchers).toHaveLength(1)
  })

  it('asks for precise location before registering', async () => {
    const { app, geofences } = setup({ accuracy: 'reduced' })

    await app.initialize()

    expect(app.store.getState().status).toBe('Precise location is required for geofences.')
    expect(app.store.getState().needsSettings).toBe(true)
    expect(geofences.calls).toEqual(['initialize'])
  })

  it('stays idle without location permission', async () => {
    const { app, geofences, permissions, positions } = setup()
    permissions.statuses.location = 'denied'

    await app.initialize()

    const state = app.store.getState()
    expect(state.status).toBe('Loaded 1 saved locations.')
    expect(state.permissionStatus).toBe('Location permission denied.')
    expect(geofences.calls).toEqual(['initialize'])
    expect(positions.watchers).toHaveLength(0)
  })

  it('reports disabled location services', async () => {
    const { app, permissions } = setup()
    permissions.serviceEnabled = false

    await app.initialize()

    expect(app.store.getState().status).toBe('Location services are disabled.')
    expect(app.store.getState().permissionStatus).toBe('Location services disabled')
  })

  it('continues with no targets when the list is invalid', async () => {
    const { app, permissions } = setup({ targets: '[{' })
    permissions.statuses.location = 'denied'

    await app.initialize()

    expect(app.store.getState().targets).toEqual([])
    expect(app.store.getState().status).toMatch(
      /^Failed to load saved locations: Target list is not valid JSON: /,
    )
  })

  it('reports an empty target list', async () => {
    const { app, geofences } = setup({ targets: '[]' })

    await app.initialize()

    expect(app.store.getState().status).toBe('No saved locations to monitor.')
    expect(app.store.getState().geofencesRegistered).toBe(false)
    expect(geofences.calls).toEqual(['initialize'])
  })

  it('counts rejected geofences in the status', async () => {
    const { app, geofences } = setup({ targets: HOME_AND_WORK })
    geofences.rejections.set('b::Work', 'tooManyGeofences')

    await app.initialize()

    expect(app.store.getState().status).toBe('Registered 1 geofences (1 failed).')
  })

  it('reports a failed clear as a geofence error', async () => {
    const { app, geofences } = setup()
    geofences.clearAllError = 'serviceUnavailable'

    await app.initialize()

    expect(app.store.getState().status).toBe('Geofence error: serviceUnavailable')
    expect(app.store.getState().geofencesRegistered).toBe(false)
  })

  it('reports a failed position fix', async () => {
    const { app, positions } = setup()
    positions.current = new Error('timeout')

    await app.initialize()

    expect(app.store.getState().status).toBe('Unable to get current position: timeout')
    expect(app.store.getState().geofencesRegistered).toBe(true)
  })

  it('reports position stream errors', async () => {
    const { app, positions } = setup()
    await app.initialize()

    positions.activeWatchers[0].onError(new Error('lost fix'))

    expect(app.store.getState().status).toBe('Location error: lost fix')
  })

  it('skips registration when the geofence service fails to start', async () => {
    const { app, geofences, positions } = setup()
    geofences.initializeError = 'serviceUnavailable'

    await app.initialize()

    expect(geofences.calls).toEqual(['initialize'])
    expect(app.store.getState().status).toBe('Geofence error: serviceUnavailable')
    expect(app.store.getState().geofencesRegistered).toBe(false)
    expect(positions.activeWatchers).toHaveLength(1)
  })

  it('runs only once until disposed', async () => {
    const { app, geofences } = setup()

    await app.initialize()
    await app.initialize()

    expect(geofences.calls.filter((call) => call === 'initialize')).toHaveLength(1)
  })
})

describe('createNearbyAlerts.registerGeofences', () => {
  it('registers once background permission is granted later', async () => {
    const { app, permissions } = setup()
    permissions.statuses.locationAlways = 'denied'
    await app.initialize()

    permissions.statuses.locationAlways = 'granted'
    await app.registerGeofences()

    expect(app.store.getState().status).toBe('Registered 1 geofences.')
    expect(app.store.getState().geofencesRegistered).toBe(true)
  })

  it('explains a missing location permission', async () => {
    const { app, permissions, geofences } = setup()
    permissions.statuses.location = 'denied'
    app.store.getState().setTargets([{ id: 'a', name: 'Home', latitude: 10, longitude: 20 }])

    await app.registerGeofences()

    expect(app.store.getState().status).toBe(
      'Location permissions are required before registering geofences.',
    )
    expect(geofences.calls).toEqual([])
  })

  it('reports missing permissions before an empty target list', async () => {
    const { app, permissions, geofences } = setup({ targets: '[]' })
    permissions.statuses.locationAlways = 'denied'

    await app.registerGeofences()

    expect(app.store.getState().status).toBe(
      'Location permissions are required before registering geofences.',
    )
    expect(geofences.calls).toEqual([])
  })

  it('explains a missing precise location', async () => {
    const { app } = setup({ accuracy: 'reduced' })
    app.store.getState().setTargets([{ id: 'a', name: 'Home', latitude: 10, longitude: 20 }])

    await app.registerGeofences()

    expect(app.store.getState().status).toBe('Enable precise location to register geofences.')
  })
})

describe('createNearbyAlerts background handler', () => {
  it('works before the foreground is initialized', async () => {
    const { app, tray, registry } = setup()

    await app.transitionHandler([{ geofenceKey: 'a::Home', eventKind: 'exit' }])
    await flushRelay()

    expect(tray.shown.map((n) => n.title)).toEqual(['Exited: Home'])
    expect(registry.lookup(RELAY_PORT_NAME)).toBeUndefined()
    expect(app.store.getState().lastEvent).toBeNull()
  })
})

describe('createNearbyAlerts.dispose', () => {
  it('releases the relay port and the position watch', async () => {
    const { app, geofences, positions, registry } = setup()
    await app.initialize()

    app.dispose()
    await geofences.fire('a::Home', 'enter')
    await flushRelay()

    expect(registry.lookup(RELAY_PORT_NAME)).toBeUndefined()
    expect(positions.activeWatchers).toHaveLength(0)
    expect(selectIsInside(app.store.getState(), 'a::Home')).toBe(false)
  })

  it('stops a startup that is still in progress', async () => {
    const { app, geofences, positions, registry } = setup()

    const starting = app.initialize()
    app.dispose()
    await starting

    expect(geofences.calls).toEqual([])
    expect(positions.watchers).toHaveLength(0)
    expect(registry.lookup(RELAY_PORT_NAME)).toBeUndefined()
  })

  it('does not register or watch after disposal mid-startup', async () => {
    const { app, geofences, positions } = setup()
    geofences.initialize = async () => {
      geofences.calls.push('initialize')
      app.dispose()
    }

    await app.initialize()

    expect(geofences.calls).toEqual(['initialize'])
    expect(positions.watchers).toHaveLength(0)
    expect(app.store.getState().geofencesRegistered).toBe(false)
  })

  it('leaves a newer receiver in place', async () => {
    const { app, registry } = setup()
    await app.initialize()
    const newer = new RelayReceiver()
    registry.register(RELAY_PORT_NAME, newer)

    app.dispose()

    expect(registry.lookup(RELAY_PORT_NAME)).toBe(newer)
  })

  it('can be initialized again', async () => {
    const { app, geofences } = setup()
    await app.initialize()
    app.dispose()

    await app.initialize()

    expect(geofences.calls.filter((call) => call === 'initialize')).toHaveLength(2)
  })
})

describe('createNearbyAlerts.openSettings', () => {
  it('opens the app settings', async () => {
    const { app, permissions } = setup()

    await expect(app.openSettings()).resolves.toBe(true)
    expect(permissions.settingsOpened).toBe(1)
  })
})
