import { CATEGORIES } from '@/types'
import { CATEGORY_COLORS, CATEGORY_LABELS } from '@/lib/highlight'

export default function HighlightLegend() {
  return (
    <div className="mt-10 pt-6 border-t border-gray-200">
      <h2 className="text-lg font-serif font-normal mb-4 text-gray-900">
        Highlight Legend
      </h2>
      <ul className="space-y-2.5 text-sm text-gray-900">
        {CATEGORIES.map(category => (
          <li key={category}>
            <span style={{ backgroundColor: CATEGORY_COLORS[category] }} className="px-1">
              {CATEGORY_LABELS[category].color}
            </span>
            <span className="ml-2 text-gray-600">{CATEGORY_LABELS[category].description}</span>
          </li>
        ))}
      </ul>
    </div>
  )
}
