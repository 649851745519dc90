import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

import { TASK_KINDS } from '../../src/interface/Account'
import { loadAccounts, loadConfig, normalizeConfig, parseAccounts, parseJsonc } from '../../src/util/Load'

describe('parseJsonc', () => {
    it('strips comments and a BOM but keeps comment-like text in strings', () => {
        const text = '\uFEFF{\n  // line\n  "url": "http://x.test/a", /* block */\n  "n": 1\n}'
        expect(parseJsonc(text)).toEqual({ url: 'http://x.test/a', n: 1 })
    })
})

describe('normalizeConfig', () => {
    it('applies defaults', () => {
        const config = normalizeConfig({})

        expect(config.execution).toEqual({ maxConcurrentAccounts: 2, sleepTime: '2s', enabledTasks: [...TASK_KINDS] })
        expect(config.retryPolicy).toEqual({ maxRetries: 3, cooldown: '2s' })
        expect(config.network).toEqual({
            timeout: '10s',
            appVersion: '2.71.1',
            salts: {
                ios: '9ttJY72HxbjwWRNHJvn0n2AYue47nYsK',
                android: 'BIPaooxbWZW02fGHZL1If26mYCljPgst',
                record: 'xV8v4Qu54lUKrEYFZkJhB8cuOh9Asafs'
            }
        })
        expect(config.verification).toEqual({
            global: false,
            url: '',
            params: {},
            body: { gt: '{gt}', challenge: '{challenge}' },
            tokenPath: 'data.validate',
            seccodePath: 'data.seccode'
        })
        expect(config.notifications).toEqual({ enabled: false, errorPushOnly: false, blockKeys: [], channels: [] })
        expect(config.reports).toEqual({ enabled: true, dir: 'reports' })
    })

    it('enables notifications when channels are configured', () => {
        const config = normalizeConfig({ notifications: { channels: [{ type: 'gotify', apiUrl: 'https://gotify.test', token: 'test-token', priority: 20 }] } })

        expect(config.notifications.enabled).toBe(true)
        expect(config.notifications.channels).toEqual([{ type: 'gotify', apiUrl: 'https://gotify.test', token: 'test-token', priority: 10 }])
    })

    it('rejects invalid values', () => {
        expect(() => normalizeConfig({ execution: { sleepTime: 'soon' } })).toThrow('Invalid duration in config: "soon"')
        expect(() => normalizeConfig({ execution: { enabledTasks: ['sign-in', 'dance'] } })).toThrow('Unknown task kind(s): dance')
        expect(() => normalizeConfig({ notifications: { channels: [{ type: 'pager' }] } })).toThrow('Unsupported notification channel type: pager')
        expect(() => normalizeConfig({ notifications: { channels: [{ type: 'telegram', chatId: '1' }] } }))
            .toThrow('notification channel "telegram" requires a non-empty "botToken"')
        expect(() => normalizeConfig([])).toThrow('config must be a JSON object')
    })
})

describe('parseAccounts', () => {
    it('fills defaults and freezes each account', () => {
        const [account] = parseAccounts([{ id: 'a1', cookie: 'ltoken_v2=test-token' }])

        expect(account).toMatchObject({
            id: 'a1',
            platform: 'ios',
            games: ['GenshinImpact', 'HonkaiImpact3', 'HoukaiGakuen2', 'TearsOfThemis', 'StarRail', 'ZenlessZoneZero'],
            tasks: [...TASK_KINDS]
        })
        expect(Object.isFrozen(account)).toBe(true)
        expect(Object.isFrozen(account?.games)).toBe(true)
    })

    it('skips disabled accounts and drops unknown games', () => {
        const log = vi.fn()
        const accounts = parseAccounts({
            accounts: [
                { id: 'a1', cookie: 'c', enabled: false },
                { id: 'a2', cookie: 'c', games: ['StarRail', 'Tetris'], platform: 'android' }
            ]
        }, log)

        expect(accounts.map(a => a.id)).toEqual(['a2'])
        expect(accounts[0]?.games).toEqual(['StarRail'])
        expect(accounts[0]?.platform).toBe('android')
        expect(log).toHaveBeenCalledWith('main', 'LOAD', 'Account a2: ignoring unknown game(s) Tetris', 'warn')
    })

    it('rejects malformed and duplicate accounts', () => {
        expect(() => parseAccounts([{ id: 'a1' }])).toThrow('account #1 must have "id" and "cookie" strings')
        expect(() => parseAccounts([{ id: 'a1', cookie: 'c' }, { id: 'a1', cookie: 'c' }])).toThrow('duplicate account id: a1')
        expect(() => parseAccounts('nope')).toThrow('accounts must be an array')
    })

    it('keeps proxy settings only when a host is given', () => {
        const [withProxy, withoutProxy] = parseAccounts([
            { id: 'a1', cookie: 'c', proxy: { url: '127.0.0.1', port: 1080, username: 'u' } },
            { id: 'a2', cookie: 'c', proxy: { url: '', port: 0 } }
        ])
        expect(withProxy?.proxy).toEqual({ url: '127.0.0.1', port: 1080, username: 'u', password: undefined })
        expect(withoutProxy?.proxy).toBeUndefined()
    })
})

describe('loading files', () => {
    let dir: string
    const savedEnv = { ...process.env }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkin-load-'))
        delete process.env.ACCOUNTS_JSON
        delete process.env.ACCOUNTS_FILE
        delete process.env.CONFIG_FILE
    })

    afterEach(() => {
        process.env = { ...savedEnv }
        fs.rmSync(dir, { recursive: true, force: true })
    })

    it('reads a JSONC config from an explicit path', () => {
        const file = path.join(dir, 'config.jsonc')
        fs.writeFileSync(file, '{ // comment\n "retryPolicy": { "maxRetries": 1 } }')

        const { config, source } = loadConfig(file)
        expect(source).toBe(file)
        expect(config.retryPolicy.maxRetries).toBe(1)
    })

    it('fails on a missing config file', () => {
        const file = path.join(dir, 'missing.json')
        expect(() => loadConfig(file)).toThrow(`config file not found: ${file}`)
    })

    it('reads accounts from ACCOUNTS_JSON', () => {
        process.env.ACCOUNTS_JSON = '[{ "id": "env", "cookie": "c" }]'
        expect(loadAccounts().map(a => a.id)).toEqual(['env'])
    })

    it('reads accounts from an explicit file', () => {
        const file = path.join(dir, 'accounts.json')
        fs.writeFileSync(file, '[{ "id": "file", "cookie": "c", "tasks": ["sign-in"] }]')

        const [account] = loadAccounts(file)
        expect(account?.id).toBe('file')
        expect(account?.tasks).toEqual(['sign-in'])
    })
})
