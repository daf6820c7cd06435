import React from 'react'
import { Box, Text } from 'ink'

interface PanelProps {
  label: string
  meta?: string
  children: React.ReactNode
}

/**
 * Panel — bordered panel with an uppercase label row and right-aligned meta.
 */
export function Panel({ label, meta, children }: PanelProps): React.ReactElement {
  return (
    <Box flexGrow={1} flexDirection="column" borderStyle="single" borderColor="#242424" paddingX={1}>
      <Box justifyContent="space-between">
        <Text color="#4FC3F7">{label.toUpperCase()}</Text>
        {meta !== undefined && <Text color="#666666">{meta}</Text>}
      </Box>
      {children}
    </Box>
  )
}
