export {
  type ApplicationOptions,
  type NamedFactOptions,
  type FactEntry,
  type Application,
  createApplication,
} from './application';
