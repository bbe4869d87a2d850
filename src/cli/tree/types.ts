import {
  AnnotationOptionType,
  KubeconfigOptionType,
  OutputOptionType,
  VerboseOptionType
} from '../commonOptions'

export type InputParams = KubeconfigOptionType &
  OutputOptionType &
  AnnotationOptionType &
  VerboseOptionType
