import type { ReactNode } from 'react';
import { keyedMessages } from '../../services/FormValidation';

type ModalProps = {
  title: string;
  subtitle?: string;
  errors?: string[];
  onClose: () => void;
  onConfirm?: () => void;
  confirmLabel?: string;
  wide?: boolean;
  children?: ReactNode;
};

const Modal = ({
  title,
  subtitle,
  errors = [],
  onClose,
  onConfirm,
  confirmLabel = 'Save',
  wide = false,
  children
}: ModalProps) => (
  <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/40 px-4">
    <div
      role="dialog"
      aria-modal="true"
      aria-label={title}
      className={`ul-surface w-full p-6 ${wide ? 'max-w-2xl' : 'max-w-md'}`}
    >
      <h3 className="text-lg font-semibold">{title}</h3>
      {subtitle && <p className="mt-2 text-sm text-muted-foreground">{subtitle}</p>}
      {children && <div className="mt-4 space-y-3">{children}</div>}
      {errors.length > 0 && (
        <ul className="mt-4 space-y-1 text-xs text-rose-500">
          {keyedMessages(errors).map(({ key, message }) => (
            <li key={key}>{message}</li>
          ))}
        </ul>
      )}
      <div className="mt-6 flex justify-end gap-2">
        <button className="ul-button ul-button-ghost" onClick={onClose}>
          Cancel
        </button>
        {onConfirm && (
          <button className="ul-button ul-button-primary" onClick={onConfirm}>
            {confirmLabel}
          </button>
        )}
      </div>
    </div>
  </div>
);

export const Field = ({ label, children }: { label: string; children: ReactNode }) => (
  <label className="block">
    <span className="text-xs uppercase text-muted-foreground">{label}</span>
    <div className="mt-2">{children}</div>
  </label>
);

export default Modal;
