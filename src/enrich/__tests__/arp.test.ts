import { describe, it, expect, vi } from 'vitest'
import { lookupArpCache, parseArpOutput, parseProcArp } from '../arp.js'
import type { ExecFn } from '../../utils/exec.js'

const PROC_ARP = [
  'IP address       HW type     Flags       HW address            Mask     Device',
  '192.168.1.1      0x1         0x2         aa:bb:cc:dd:ee:0f     *        eth0',
  '192.168.1.20     0x1         0x0         00:00:00:00:00:00     *        eth0',
  '192.168.1.30     0x1         0x6         0a:1b:2c:3d:4e:5f     *        eth0',
  '',
].join('\n')

describe('parseProcArp', () => {
  it('returns the normalized MAC of a complete entry', () => {
    expect(parseProcArp(PROC_ARP, '192.168.1.1')).toBe('AA:BB:CC:DD:EE:0F')
  })

  it('accepts entries with extra flags set', () => {
    expect(parseProcArp(PROC_ARP, '192.168.1.30')).toBe('0A:1B:2C:3D:4E:5F')
  })

  it('ignores incomplete entries', () => {
    expect(parseProcArp(PROC_ARP, '192.168.1.20')).toBeUndefined()
  })

  it('does not match a longer address with the same prefix', () => {
    expect(parseProcArp(PROC_ARP, '192.168.1.2')).toBeUndefined()
  })

  it('returns undefined for an unknown host', () => {
    expect(parseProcArp(PROC_ARP, '10.0.0.1')).toBeUndefined()
  })
})

describe('parseArpOutput', () => {
  it('reads the BSD form and pads short octets', () => {
    const out = '? (192.168.1.7) at 0:1b:2c:3:4:5 on en0 ifscope [ethernet]\n'
    expect(parseArpOutput(out, '192.168.1.7')).toBe('00:1B:2C:03:04:05')
  })

  it('reads the net-tools table', () => {
    const out = [
      'Address                  HWtype  HWaddress           Flags Mask            Iface',
      '192.168.1.7              ether   de:ad:be:ef:00:01   C                     eth0',
    ].join('\n')
    expect(parseArpOutput(out, '192.168.1.7')).toBe('DE:AD:BE:EF:00:01')
  })

  it('reads the Windows table with dashes', () => {
    const out = [
      '',
      'Interface: 192.168.1.50 --- 0xb',
      '  Internet Address      Physical Address      Type',
      '  192.168.1.7           de-ad-be-ef-00-02     dynamic',
    ].join('\r\n')
    expect(parseArpOutput(out, '192.168.1.7')).toBe('DE:AD:BE:EF:00:02')
  })

  it('returns undefined when the entry has no address', () => {
    const out = '? (192.168.1.7) at (incomplete) on en0 ifscope [ethernet]\n'
    expect(parseArpOutput(out, '192.168.1.7')).toBeUndefined()
  })

  it('returns undefined when the host is not listed', () => {
    expect(parseArpOutput('192.168.1.70 (192.168.1.70) -- no entry\n', '192.168.1.7')).toBeUndefined()
  })
})

describe('lookupArpCache', () => {
  it('reads /proc/net/arp on Linux', async () => {
    const readFile = vi.fn(async (_path: string) => PROC_ARP)
    const exec = vi.fn<Parameters<ExecFn>, ReturnType<ExecFn>>()

    const mac = await lookupArpCache('192.168.1.1', { platform: 'linux', readFile, exec })

    expect(mac).toBe('AA:BB:CC:DD:EE:0F')
    expect(readFile).toHaveBeenCalledWith('/proc/net/arp')
    expect(exec).not.toHaveBeenCalled()
  })

  it('runs arp -n elsewhere', async () => {
    const exec = vi.fn<Parameters<ExecFn>, ReturnType<ExecFn>>(async () => ({
      stdout: '? (192.168.1.7) at de:ad:be:ef:00:03 on en0\n',
      stderr: '',
    }))

    const mac = await lookupArpCache('192.168.1.7', { platform: 'darwin', exec, timeout: 500 })

    expect(mac).toBe('DE:AD:BE:EF:00:03')
    expect(exec).toHaveBeenCalledWith('arp', ['-n', '192.168.1.7'], { timeout: 500, signal: undefined })
  })

  it('runs arp -a on Windows', async () => {
    const exec = vi.fn<Parameters<ExecFn>, ReturnType<ExecFn>>(async () => ({ stdout: '', stderr: '' }))

    expect(await lookupArpCache('192.168.1.7', { platform: 'win32', exec })).toBeUndefined()
    expect(exec.mock.calls[0][1]).toEqual(['-a', '192.168.1.7'])
  })

  it('rejects when the command fails', async () => {
    const exec: ExecFn = async () => {
      throw new Error('spawn arp ENOENT')
    }
    await expect(lookupArpCache('192.168.1.7', { platform: 'freebsd', exec })).rejects.toThrow('spawn arp ENOENT')
  })
})
