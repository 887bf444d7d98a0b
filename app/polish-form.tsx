'use client'

import { useState } from 'react'
import { ErrorBody, HighlightSegment, POLISH_STYLES, PolishResult, PolishStyle } from '@/types'
import { X, Copy } from 'lucide-react'
import HighlightLegend from './highlight-legend'

function isPolishStyle(value: string): value is PolishStyle {
  return POLISH_STYLES.some(style => style === value)
}

function isErrorBody(value: unknown): value is ErrorBody {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false
  const { error } = value
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
}

async function requestPolish(text: string, style: PolishStyle): Promise<PolishResult> {
  const response = await fetch('/api/polish', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ text, style }),
  })
  const data: unknown = await response.json()
  if (!response.ok) {
    throw new Error(isErrorBody(data) ? data.error.message : `Request failed with status ${response.status}`)
  }
  return data as PolishResult
}

// Sentences joined by a single space, colored by category
function renderSegments(segments: HighlightSegment[]): React.ReactNode[] {
  const nodes: React.ReactNode[] = []
  segments.forEach((segment, index) => {
    if (index > 0) nodes.push(' ')
    nodes.push(
      segment.color ? (
        <span
          key={index}
          data-category={segment.category}
          title={segment.category}
          style={{ backgroundColor: segment.color }}
        >
          {segment.text}
        </span>
      ) : (
        segment.text
      )
    )
  })
  return nodes
}

export default function PolishForm() {
  const [inputText, setInputText] = useState('')
  const [style, setStyle] = useState<PolishStyle>(POLISH_STYLES[0])
  const [result, setResult] = useState<PolishResult | null>(null)
  const [loading, setLoading] = useState(false)
  const [warning, setWarning] = useState<string | null>(null)
  const [error, setError] = useState<string | null>(null)

  const handlePolish = async () => {
    if (!inputText.trim()) {
      setWarning('Please enter some text first.')
      setResult(null)
      return
    }

    setLoading(true)
    setWarning(null)
    setError(null)
    setResult(null)

    try {
      setResult(await requestPolish(inputText, style))
    } catch (err) {
      setError(err instanceof Error ? err.message : 'An error occurred while polishing your text.')
    } finally {
      setLoading(false)
    }
  }

  const handleCopy = () => {
    if (result?.polished_text) {
      void navigator.clipboard.writeText(result.polished_text)
    }
  }

  const handleClear = () => {
    setInputText('')
    setResult(null)
    setWarning(null)
    setError(null)
  }

  return (
    <div className="min-h-screen bg-white p-8">
      <div className="max-w-7xl mx-auto">
        <div className="flex items-center justify-between mb-6">
          <h1 className="text-3xl font-serif font-normal text-gray-900">
            Professional Communication Assistant
          </h1>
          <label className="flex items-center gap-3 text-sm text-gray-700">
            Choose polishing style:
            <select
              value={style}
              onChange={(e) => {
                if (isPolishStyle(e.target.value)) setStyle(e.target.value)
              }}
              className="px-3 py-1.5 border border-gray-200 rounded bg-white focus:outline-none focus:ring-1 focus:ring-gray-400"
            >
              {POLISH_STYLES.map(option => (
                <option key={option} value={option}>{option}</option>
              ))}
            </select>
          </label>
        </div>

        <div className="border-b border-gray-200 mb-8"></div>

        {warning && (
          <div className="mb-6 p-4 bg-amber-50 border border-amber-200 text-amber-800 rounded-sm">
            {warning}
          </div>
        )}

        {error && (
          <div className="mb-6 p-4 bg-red-50 border border-red-200 text-red-800 rounded-sm">
            {error}
          </div>
        )}

        {loading && (
          <div className="mb-6 p-4 bg-gray-50 border border-gray-200 text-gray-700 rounded-sm">
            Polishing your text...
          </div>
        )}

        <div className="grid grid-cols-1 lg:grid-cols-2 gap-8 mb-8">
          {/* Left: draft */}
          <div className="flex flex-col min-h-[26rem]">
            <div className="flex justify-between items-center mb-3">
              <label className="text-sm font-normal text-gray-700">
                Your Draft
              </label>
              <button
                onClick={handleClear}
                aria-label="Clear draft"
                className="inline-flex items-center gap-1.5 px-3 py-1.5 text-sm text-gray-700 hover:text-gray-900 hover:bg-gray-50 rounded transition-colors focus:outline-none focus:ring-2 focus:ring-gray-400 focus:ring-offset-1"
              >
                <X className="w-4 h-4" strokeWidth={1.5} />
                Clear
              </button>
            </div>

            <textarea
              value={inputText}
              onChange={(e) => setInputText(e.target.value)}
              placeholder="Write or paste your draft…"
              className="w-full flex-1 min-h-[18rem] p-5 border border-gray-200 rounded font-serif text-gray-900 leading-relaxed resize-none focus:outline-none focus:ring-1 focus:ring-gray-400 focus:border-gray-300 mb-4 text-base"
            />

            <button
              onClick={handlePolish}
              disabled={loading}
              className="w-full px-6 py-3 bg-brand-red text-white rounded hover:bg-brand-red-dark disabled:opacity-50 disabled:cursor-not-allowed transition-colors font-normal text-base"
            >
              {loading ? 'Polishing...' : 'Polish'}
            </button>
          </div>

          {/* Right: polished output, only once a result exists */}
          {result && (
            <div className="flex flex-col min-h-[26rem]">
              <div className="flex justify-between items-center mb-3">
                <label className="text-sm font-normal text-gray-700">
                  Polished Version
                </label>
                <button
                  onClick={handleCopy}
                  aria-label="Copy polished text to clipboard"
                  className="inline-flex items-center gap-1.5 px-3 py-1.5 text-sm text-gray-700 hover:text-gray-900 hover:bg-gray-50 rounded transition-colors focus:outline-none focus:ring-2 focus:ring-gray-400 focus:ring-offset-1"
                >
                  <Copy className="w-4 h-4" strokeWidth={1.5} />
                  Copy polished text
                </button>
              </div>

              <div className="w-full flex-1 min-h-[18rem] p-5 border border-gray-200 rounded font-mono text-black leading-relaxed whitespace-pre-wrap bg-white overflow-y-auto text-base">
                {renderSegments(result.segments)}
              </div>
            </div>
          )}
        </div>

        {result && <HighlightLegend />}
      </div>
    </div>
  )
}
