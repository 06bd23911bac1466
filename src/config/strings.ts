export type StringKey =
  | 'THIS_MESSAGE_WAS_DELETED'
  | 'YOU_DELETED_THIS_MESSAGE'
  | 'MESSAGE_STATUS_DOWNLOADING'

const en: Record<StringKey, string> = {
  THIS_MESSAGE_WAS_DELETED: 'This message was deleted.',
  YOU_DELETED_THIS_MESSAGE: 'You deleted this message.',
  MESSAGE_STATUS_DOWNLOADING: 'Downloading…',
}

export function localized(key: StringKey): string {
  return en[key]
}
