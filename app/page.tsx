import { getConfigError } from '@/lib/config'
import PolishForm from './polish-form'

// Configuration is read from the environment on every request
export const dynamic = 'force-dynamic'

export default function Home() {
  const configError = getConfigError()

  if (configError) {
    return (
      <div className="min-h-screen bg-gray-50 flex flex-col items-center justify-center p-4">
        <div className="bg-white p-8 rounded border border-red-200 shadow-sm max-w-md w-full">
          <h1 className="text-2xl font-serif text-gray-900 text-center mb-4">
            Professional Communication Assistant
          </h1>
          <div role="alert" className="text-red-700 text-sm bg-red-50 p-3 rounded border border-red-100">
            {configError}
          </div>
        </div>
      </div>
    )
  }

  return <PolishForm />
}
