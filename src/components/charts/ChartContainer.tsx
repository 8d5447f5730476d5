interface ChartContainerProps {
  title?: string
  subtitle?: string
  actions?: React.ReactNode
  children: React.ReactNode
}

export function ChartContainer({ title, subtitle, actions, children }: ChartContainerProps) {
  return (
    <div className="chart-container">
      {(title || actions) && (
        <div className="flex items-start justify-between mb-2 gap-4">
          <div>
            {title && <h4 className="text-sm font-medium text-gray-700 dark:text-gray-300">{title}</h4>}
            {subtitle && <p className="text-xs text-gray-500 dark:text-gray-400">{subtitle}</p>}
          </div>
          {actions}
        </div>
      )}
      <div className="bg-white dark:bg-gray-800 rounded-md p-2">{children}</div>
    </div>
  )
}
