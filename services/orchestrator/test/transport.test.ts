import { MockBinding } from '@serialport/binding-mock'
import { SerialPortMock } from 'serialport'

import { TransportError } from '../src/devices/power-supply/errors'
import { PowerSupplyService } from '../src/devices/power-supply/PowerSupplyService'
import {
    findPowerSupplyPort,
    listSerialPorts,
    SerialPortTransport,
    type SerialPortInfoLike,
} from '../src/devices/power-supply/transport'
import type { PowerSupplyTransportConfig } from '../src/devices/power-supply/types'
import { RecordingSink, testConfig, waitFor } from './helpers/fakeTransport'

const PATH = '/dev/ttyPSU0'

const PORTS: SerialPortInfoLike[] = [
    { path: '/dev/ttyS0' },
    { path: PATH, manufacturer: 'ArteryTek', vendorId: '2E3C', productId: '5740' },
]

function config(path: string | null = PATH): PowerSupplyTransportConfig {
    return { path, baudRate: 115200, rtscts: true }
}

describe('SerialPortTransport', () => {
    let mock: SerialPortMock | null
    let transport: SerialPortTransport

    function make(cfg: PowerSupplyTransportConfig, ports: SerialPortInfoLike[] = PORTS): SerialPortTransport {
        transport = new SerialPortTransport(cfg, {
            createPort: ({ path, baudRate }) => {
                mock = new SerialPortMock({ path, baudRate, autoOpen: false })
                return mock
            },
            listPorts: async () => ports,
        })
        return transport
    }

    beforeEach(() => {
        mock = null
        MockBinding.reset()
        MockBinding.createPort(PATH, { echo: false, record: true })
    })

    afterEach(async () => {
        await transport.close()
    })

    test('writes reach the port', async () => {
        make(config())
        await transport.open()
        expect(transport.isOpen).toBe(true)

        await transport.write(Uint8Array.of(0xf1, 0xa1, 0xff, 0x01, 0x00, 0x00))

        expect(mock?.port?.recording).toEqual(Buffer.from([0xf1, 0xa1, 0xff, 0x01, 0x00, 0x00]))
    })

    test('read waits for incoming bytes and honours maxBytes', async () => {
        make(config())
        await transport.open()

        mock?.port?.emitData(Buffer.from([1, 2, 3, 4, 5, 6]))

        expect([...(await transport.read(4, 500))]).toEqual([1, 2, 3, 4])
        expect([...(await transport.read(4, 0))]).toEqual([5, 6])
    })

    test('read returns empty after the timeout', async () => {
        make(config())
        await transport.open()

        const bytes = await transport.read(16, 20)
        expect(bytes).toHaveLength(0)
    })

    test('a port error surfaces on the next read', async () => {
        make(config())
        await transport.open()

        mock?.emit('error', new Error('unplugged'))

        await expect(transport.read(16, 20)).rejects.toThrow('Transport read failed: unplugged')
    })

    test('open failure is a TransportError', async () => {
        make(config('/dev/ttyMISSING'))
        const err = await transport.open().catch((e: unknown) => e)

        expect(err).toBeInstanceOf(TransportError)
        expect(err instanceof TransportError && err.operation).toBe('open')
        expect(transport.isOpen).toBe(false)
    })

    test('discovers the port by USB id when no path is configured', async () => {
        make(config(null))
        await transport.open()

        expect(transport.path).toBe(PATH)
        expect(transport.isOpen).toBe(true)
    })

    test('fails to open when discovery finds nothing', async () => {
        make(config(null), [{ path: '/dev/ttyS0' }])
        await expect(transport.open()).rejects.toThrow(TransportError)
    })

    test('a port closed underneath a session disconnects it', async () => {
        make(config())
        const sink = new RecordingSink()
        const service = new PowerSupplyService(testConfig(), { events: sink, transport })
        await service.connect()

        const port = mock
        if (!port) throw new Error('no port was created')
        await new Promise<void>((resolve, reject) => {
            port.close(err => (err ? reject(err) : resolve()))
        })

        await waitFor(() => sink.kinds().includes('psu-disconnected'))
        expect(service.getPhase()).toBe('disconnected')
        expect(sink.events[sink.events.length - 1]).toMatchObject({
            kind: 'psu-disconnected',
            reason: 'port-lost',
        })
        expect(sink.events.filter(e => e.kind === 'recoverable-error')).toHaveLength(1)
    })

    test('close is idempotent and stops further I/O', async () => {
        make(config())
        await transport.open()

        await transport.close()
        await transport.close()

        expect(transport.isOpen).toBe(false)
        await expect(transport.write(Uint8Array.of(0))).rejects.toThrow(TransportError)
        await expect(transport.read(1, 0)).rejects.toThrow(TransportError)
    })
})

describe('port listing', () => {
    test('titles ports and normalises USB ids', async () => {
        const ports = await listSerialPorts(async () => PORTS)

        expect(ports).toEqual([
            { path: '/dev/ttyS0', title: '/dev/ttyS0', description: '', vendorId: null, productId: null },
            {
                path: PATH,
                title: `${PATH} - ArteryTek`,
                description: 'ArteryTek',
                vendorId: '2e3c',
                productId: '5740',
            },
        ])
    })

    test('findPowerSupplyPort matches the supply only', async () => {
        expect(await findPowerSupplyPort(async () => PORTS)).toBe(PATH)
        expect(await findPowerSupplyPort(async () => [{ path: '/dev/ttyS0' }])).toBeNull()
    })

    test('listing failures are TransportErrors', async () => {
        const err = await listSerialPorts(async () => {
            throw new Error('udev unavailable')
        }).catch((e: unknown) => e)

        expect(err).toBeInstanceOf(TransportError)
        expect(err instanceof TransportError && err.operation).toBe('list')
    })
})
