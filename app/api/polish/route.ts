import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'
import { ErrorBody, POLISH_STYLES, PolishResult } from '@/types'
import { AppConfig, ConfigError, loadConfig } from '@/lib/config'
import { createLlmClient } from '@/lib/llm'
import { polishDraft } from '@/lib/pipeline'

const polishRequestSchema = z.object({
    text: z.string(),
    style: z.enum(POLISH_STYLES),
})

// Helper to create error response
function errorResponse(
    status: number,
    type: string,
    message: string
): NextResponse<ErrorBody> {
    return NextResponse.json(
        { error: { type, message } },
        {
            status,
            headers: {
                'Cache-Control': 'no-store',
            },
        }
    )
}

// Helper to create success response
function successResponse(
    data: PolishResult
): NextResponse<PolishResult> {
    return NextResponse.json(data, {
        headers: {
            'Cache-Control': 'no-store',
        },
    })
}

export async function POST(req: NextRequest) {
    let config: AppConfig
    try {
        config = loadConfig()
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`[Polish] event=config_error message="${error.message}"`)
            return errorResponse(500, 'config_error', error.message)
        }
        throw error
    }

    let body: unknown
    try {
        body = await req.json()
    } catch {
        return errorResponse(400, 'invalid_request', 'Request body must be JSON')
    }

    const parsed = polishRequestSchema.safeParse(body)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        return errorResponse(400, 'invalid_request', `${issue.path.join('.') || 'body'}: ${issue.message}`)
    }

    const { text, style } = parsed.data
    if (!text.trim()) return errorResponse(400, 'empty_input', 'Please enter some text first.')
    if (text.length > config.maxTextLength) {
        return errorResponse(400, 'invalid_request', `Text must be at most ${config.maxTextLength} characters`)
    }

    const client = createLlmClient(config)
    console.log(`[Polish] event=request provider=${client.provider} model=${client.model} style=${style} length=${text.length}`)

    let result: PolishResult
    try {
        result = await polishDraft(client, text, style)
    } catch (error) {
        console.error(`[Polish] event=upstream_error provider=${client.provider} model=${client.model}`, error)
        const message = error instanceof Error ? error.message : 'The language model request failed'
        return errorResponse(502, 'upstream_error', message)
    }

    const resp = successResponse(result)
    resp.headers.set('X-Provider', client.provider)
    resp.headers.set('X-Model', client.model)
    return resp
}
