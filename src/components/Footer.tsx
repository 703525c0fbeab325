import React from 'react';

const Footer: React.FC = () => (
  <footer className="app-footer">
    <span>
      Data source:{' '}
      <a href="https://datasets.wri.org/dataset/globalpowerplantdatabase" target="_blank" rel="noopener noreferrer">
        World Resources Institute (WRI) Global Power Plant Database
      </a>
    </span>
  </footer>
);

export default Footer;
