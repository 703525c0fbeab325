import React from 'react';
import { Zap } from 'lucide-react';

interface HeaderProps {
  country: string | null;
}

const Header: React.FC<HeaderProps> = ({ country }) => {
  return (
    <header className="header">
      <div className="header-content">
        <Zap size={22} className="header-icon" aria-hidden="true" />
        <h1 className="header-title">
          Energy Infrastructure{country ? `: ${country}` : ''}
        </h1>
      </div>
    </header>
  );
};

export default Header;
