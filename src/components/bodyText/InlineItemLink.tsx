import { useEffect, useRef } from 'react'
import type { CSSProperties, ReactNode } from 'react'
import type { BodyTextItem } from '../../types/bodyText'
import { PressGesture } from './pressGesture'
import type { Schedule } from './pressGesture'

type Props = {
  item: BodyTextItem
  className: string
  style?: CSSProperties
  onActivate: () => void
  onLongPress: () => void
  children: ReactNode
}

const windowSchedule: Schedule = (fn, ms) => {
  const id = window.setTimeout(fn, ms)
  return () => window.clearTimeout(id)
}

function ariaLabel(item: BodyTextItem): string {
  switch (item.kind) {
    case 'dataItem':
      return `${item.dataItem.kind}: ${item.dataItem.snippet}`
    case 'mention':
      return 'mention'
    case 'referencedUser':
      return 'referenced user'
    case 'unrevealedSpoiler':
      return 'hidden text, activate to reveal'
  }
}

export default function InlineItemLink({ item, className, style, onActivate, onLongPress, children }: Props) {
  const gesture = useRef<PressGesture | null>(null)
  if (!gesture.current) gesture.current = new PressGesture({ onActivate, onLongPress }, windowSchedule)
  const press = gesture.current
  press.handlers = { onActivate, onLongPress }

  useEffect(() => {
    return () => press.cancel()
  }, [press])

  return (
    <span
      role="link"
      tabIndex={0}
      aria-label={ariaLabel(item)}
      className={`cursor-pointer ${className}`.trim()}
      style={style}
      onClick={() => press.click()}
      onContextMenu={(e) => { e.preventDefault(); onLongPress() }}
      onTouchStart={() => press.touchStart()}
      onTouchEnd={() => press.touchEnd()}
      onKeyDown={(e) => { if (e.key === 'Enter') onActivate() }}
    >
      {children}
    </span>
  )
}
